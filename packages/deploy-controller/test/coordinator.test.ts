import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { DEPLOY_PHASES, type DeployEvent, type DeployPhase } from "@stackship/deploy-events"
import { createErrorLogger, type ErrorLogEntry, type ErrorLogSink, silentLogger } from "@stackship/logger"
import type { ServiceDescriptor } from "@stackship/shared"
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest"
import { DeploymentCoordinator, sourceDirectories } from "../src/coordinator.js"
import { DnsReconciler, desiredRecordNames } from "../src/dns/reconciler.js"
import { ConnectionError, OrchestrationError, TransferError, ZoneNotFoundError } from "../src/errors.js"
import { ContainerOrchestrator } from "../src/executors/containers.js"
import { HostPreparer } from "../src/executors/host.js"
import { ArtifactTransfer } from "../src/executors/transfer.js"
import type { SessionFactory } from "../src/session/remote-session.js"
import type { DeploymentTarget, DeployPlan, DeployRequest } from "../src/types.js"
import { FakeDnsProvider } from "./fakes/fake-dns.js"
import { FakeRemoteSession } from "./fakes/fake-session.js"
import { target } from "./fixtures.js"

const services: ServiceDescriptor[] = [
  { name: "web", build: "./web", port: 5000, subdomain: "app", aliases: ["api"] },
  { name: "cache", image: "redis:7", port: 6379, internal: true },
]

let localRoot: string

beforeAll(async () => {
  localRoot = await mkdtemp(join(tmpdir(), "stackship-coordinator-"))
  await mkdir(join(localRoot, "web"))
  await writeFile(join(localRoot, "web", "app.py"), "print('ok')\n")
})

afterAll(async () => {
  await rm(localRoot, { recursive: true, force: true })
})

interface HarnessOptions {
  dns?: boolean
  provider?: FakeDnsProvider
  resolver?: (name: string) => Promise<string[]>
  connectError?: Error
  script?: (session: FakeRemoteSession, target: DeploymentTarget) => void
  confirm?: (plan: DeployPlan) => boolean
  errorSink?: ErrorLogSink
}

function harness(options: HarnessOptions = {}) {
  const sessions: FakeRemoteSession[] = []
  const events: DeployEvent[] = []
  const errorEntries: ErrorLogEntry[] = []
  const provider =
    options.provider ??
    new FakeDnsProvider({
      zones: [
        { id: "zone-1", name: "example.com" },
        { id: "zone-2", name: "example.org" },
      ],
    })

  const sessionFactory = vi.fn<SessionFactory>(async deployTarget => {
    if (options.connectError) throw options.connectError
    const session = new FakeRemoteSession(deployTarget.address)
    session.on("logs --tail 50 caddy", { stdout: "serving initial configuration\n" })
    options.script?.(session, deployTarget)
    sessions.push(session)
    return session
  })

  const coordinator = new DeploymentCoordinator({
    sessionFactory,
    dns:
      options.dns === false
        ? null
        : new DnsReconciler(provider, {
            propagationDelayMs: 0,
            resolver: options.resolver ?? (async () => ["203.0.113.10"]),
            logger: silentLogger,
          }),
    hostPreparer: new HostPreparer({ projectDir: "/srv/app", logger: silentLogger, secret: () => "test-secret" }),
    transfer: new ArtifactTransfer({ logger: silentLogger }),
    orchestrator: new ContainerOrchestrator({ projectDir: "/srv/app", settleDelayMs: 0, logger: silentLogger }),
    confirm: options.confirm,
    logger: silentLogger,
    errorLogger: createErrorLogger(
      options.errorSink ??
        (entry => {
          errorEntries.push(entry)
        }),
    ),
  })
  coordinator.subscribe(event => {
    events.push(event)
  })

  return { coordinator, sessions, events, errorEntries, provider, sessionFactory }
}

function request(overrides: Partial<DeployRequest> = {}, domain = "example.com"): DeployRequest {
  return { target: { ...target, domain }, services, localRoot, ...overrides }
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

function phasesStarted(events: DeployEvent[], runId?: string): DeployPhase[] {
  const phases: DeployPhase[] = []
  for (const event of events) {
    if (event.type === "phase_start" && (!runId || event.runId === runId)) phases.push(event.phase)
  }
  return phases
}

function statuses(events: DeployEvent[]): string[] {
  const result: string[] = []
  for (const event of events) {
    if (event.type === "run_status") result.push(event.status)
  }
  return result
}

function warnings(events: DeployEvent[]): string[] {
  const result: string[] = []
  for (const event of events) {
    if (event.type === "step" && event.level === "warn") result.push(event.message)
  }
  return result
}

describe("sourceDirectories", () => {
  it("collects build contexts and mount sources once each", () => {
    expect(
      sourceDirectories([
        { name: "web", build: "./web", port: 5000 },
        {
          name: "site",
          image: "nginx:alpine",
          port: 80,
          mounts: [
            { source: "./static-site", target: "/usr/share/nginx/html" },
            { source: "./web", target: "/srv/shared" },
          ],
        },
      ]),
    ).toEqual(["./static-site", "./web"])
  })
})

describe("DeploymentCoordinator", () => {
  describe("successful run", () => {
    it("runs every phase in order and completes", async () => {
      const { coordinator, events, sessions } = harness()

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
      expect(run.completedPhases).toEqual([...DEPLOY_PHASES])
      expect(run.error).toBeUndefined()
      expect(run.dnsRecords).toHaveLength(5)
      expect(run.verification?.signal).toBe("serving")
      expect(phasesStarted(events)).toEqual([...DEPLOY_PHASES])
      expect(statuses(events)).toEqual(["queued", "running", "completed"])
      expect(sessions).toHaveLength(1)
      expect(sessions[0].closeCount).toBe(1)
    })

    it("uploads sources before writing and starting the stack", async () => {
      const { coordinator, sessions } = harness()

      await coordinator.deploy(request())

      const [session] = sessions
      expect([...session.uploads.keys()]).toEqual(["/srv/app/web/app.py"])
      expect([...session.files.keys()]).toEqual(["/srv/app/docker-compose.prod.yml", "/srv/app/Caddyfile.prod"])
      const upIndex = session.commands.findIndex(command => command.endsWith("up -d --build"))
      const prepIndex = session.commands.indexOf("docker compose version")
      expect(prepIndex).toBeGreaterThanOrEqual(0)
      expect(upIndex).toBeGreaterThan(prepIndex)
    })

    it("tags every event with the run id", async () => {
      const { coordinator, events } = harness()

      const run = await coordinator.deploy(request())

      expect(events.every(event => event.runId === run.id)).toBe(true)
    })

    it("lists the public URLs as steps of the verify phase", async () => {
      const { coordinator, events } = harness()

      await coordinator.deploy(request())

      const verifySteps = events.filter(event => event.type === "step" && event.phase === "verify")
      expect(verifySteps.map(event => event.message)).toEqual(["https://api.example.com", "https://app.example.com"])
    })
  })

  describe("phase failures", () => {
    const cases: Array<{ phase: DeployPhase; options: () => HarnessOptions; errorType: new (...args: never[]) => Error }> =
      [
        {
          phase: "connect",
          options: () => ({ connectError: new ConnectionError("203.0.113.10", "connection refused") }),
          errorType: ConnectionError,
        },
        {
          phase: "dns",
          options: () => ({ provider: new FakeDnsProvider({ zones: [] }) }),
          errorType: ZoneNotFoundError,
        },
        {
          phase: "host_prep",
          options: () => ({ script: session => session.on("docker compose version", { exitCode: 1 }) }),
          errorType: OrchestrationError,
        },
        {
          phase: "transfer",
          options: () => ({
            script: session => {
              session.failUpload = () => new Error("disk full")
            },
          }),
          errorType: TransferError,
        },
        {
          phase: "orchestrate",
          options: () => ({
            script: session => session.on("up -d --build", { exitCode: 1, stderr: "build failed" }),
          }),
          errorType: OrchestrationError,
        },
        {
          phase: "verify",
          options: () => ({ script: session => session.on(/ ps$/, new Error("channel closed")) }),
          errorType: Error,
        },
      ]

    it.each(cases)("stops at a failing $phase phase", async ({ phase, options, errorType }) => {
      const { coordinator, events, sessions } = harness(options())
      const index = DEPLOY_PHASES.indexOf(phase)

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("failed")
      expect(run.phase).toBe(phase)
      expect(run.error).toBeInstanceOf(errorType)
      expect(run.completedPhases).toEqual(DEPLOY_PHASES.slice(0, index))
      expect(phasesStarted(events)).toEqual(DEPLOY_PHASES.slice(0, index + 1))
      expect(statuses(events)).toEqual(["queued", "running", "failed"])
      expect(sessions.every(session => session.closeCount === 1)).toBe(true)
    })

    it("keeps the original error and reports its code", async () => {
      const refused = new ConnectionError("203.0.113.10", "connection refused")
      const { coordinator, events, errorEntries } = harness({ connectError: refused })

      const run = await coordinator.deploy(request())

      expect(run.error).toBe(refused)
      const failed = events.at(-1)
      expect(failed).toMatchObject({
        type: "run_status",
        status: "failed",
        phase: "connect",
        errorCode: "CONNECTION_FAILED",
        message: "Cannot connect to 203.0.113.10: connection refused",
      })
      expect(errorEntries).toHaveLength(1)
      expect(errorEntries[0]).toMatchObject({
        level: "error",
        message: "Deployment failed",
        error: refused,
        context: { runId: run.id, phase: "connect", domain: "example.com" },
      })
    })

    it("still resolves when the error logger rejects", async () => {
      const { coordinator } = harness({
        connectError: new ConnectionError("203.0.113.10", "connection refused"),
        errorSink: async () => {
          throw new Error("sink offline")
        },
      })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("failed")
      expect(run.error).toBeInstanceOf(ConnectionError)
    })

    it("does not touch the host when DNS fails", async () => {
      const { coordinator, sessions } = harness({ provider: new FakeDnsProvider({ zones: [] }) })

      await coordinator.deploy(request())

      expect(sessions[0].commands).toEqual([])
    })
  })

  describe("DNS phase", () => {
    it("is skipped without a provider", async () => {
      const { coordinator, events } = harness({ dns: false })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
      expect(run.dnsRecords).toEqual([])
      expect(events).toContainEqual(
        expect.objectContaining({
          type: "phase_complete",
          phase: "dns",
          skipped: true,
          message: "no DNS provider configured",
        }),
      )
    })

    it("is skipped when automatic DNS is turned off", async () => {
      const { coordinator, events, provider } = harness()

      await coordinator.deploy(request({ autoDns: false }))

      expect(provider.writeCount).toBe(0)
      expect(events).toContainEqual(
        expect.objectContaining({ type: "phase_complete", phase: "dns", skipped: true, message: "automatic DNS disabled" }),
      )
    })

    it("continues past a failing record", async () => {
      const { coordinator, events, provider } = harness()
      provider.failingNames.add("api.example.com")

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
      expect(run.dnsRecords).toHaveLength(4)
      expect(warnings(events)).toEqual([
        "api.example.com: failed (Cloudflare API error: write rejected for api.example.com)",
      ])
      expect(events).toContainEqual(
        expect.objectContaining({
          type: "phase_complete",
          phase: "dns",
          message: "4/5 records in desired state, 1 failed",
        }),
      )
    })

    it("warns about names that do not resolve yet", async () => {
      const { coordinator, events } = harness({ resolver: async () => [] })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
      expect(warnings(events)).toEqual(
        desiredRecordNames("example.com").map(name => `${name} does not resolve to 203.0.113.10 yet`),
      )
    })

    it("skips the propagation check on request", async () => {
      const resolver = vi.fn(async () => [])
      const { coordinator } = harness({ resolver })

      await coordinator.deploy(request({ verifyDns: false }))

      expect(resolver).not.toHaveBeenCalled()
    })
  })

  describe("cancellation", () => {
    it("cancels a queued run before any phase", async () => {
      const { coordinator, events, sessionFactory } = harness()
      const created = coordinator.createRun(request())

      expect(coordinator.cancelRun(created.id)).toBe(true)
      const run = await coordinator.startRun(created.id)

      expect(run.status).toBe("cancelled")
      expect(run.completedPhases).toEqual([])
      expect(sessionFactory).not.toHaveBeenCalled()
      expect(events.at(-1)).toMatchObject({ type: "run_status", status: "cancelled", message: "Cancelled by request" })
    })

    it("stops at the next phase boundary and keeps earlier effects", async () => {
      const { coordinator, events, sessions, provider } = harness()
      coordinator.subscribe(event => {
        if (event.type === "phase_complete" && event.phase === "dns") {
          coordinator.cancelRun(event.runId)
        }
      })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("cancelled")
      expect(run.completedPhases).toEqual(["connect", "dns"])
      expect(phasesStarted(events)).toEqual(["connect", "dns"])
      expect(statuses(events)).toEqual(["queued", "running", "cancelled"])
      expect(sessions[0].commands).toEqual([])
      expect(sessions[0].closeCount).toBe(1)
      expect(provider.records).toHaveLength(5)
    })

    it("reports the phase the run was in", async () => {
      const { coordinator, events } = harness()
      coordinator.subscribe(event => {
        if (event.type === "phase_start" && event.phase === "transfer") {
          coordinator.cancelRun(event.runId, "Operator stopped the deploy")
        }
      })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("cancelled")
      expect(events).toContainEqual(
        expect.objectContaining({
          type: "run_status",
          status: "cancelled",
          phase: "transfer",
          message: "Operator stopped the deploy",
        }),
      )
    })

    it("returns false for finished or unknown runs", async () => {
      const { coordinator } = harness()

      const run = await coordinator.deploy(request())

      expect(coordinator.cancelRun(run.id)).toBe(false)
      expect(coordinator.cancelRun("unknown")).toBe(false)
    })

    it("cancels when the deployment is not confirmed", async () => {
      const confirm = vi.fn(() => false)
      const { coordinator, sessionFactory, events } = harness({ confirm })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("cancelled")
      expect(sessionFactory).not.toHaveBeenCalled()
      expect(confirm).toHaveBeenCalledWith({
        runId: run.id,
        target: request().target,
        services: ["cache", "web"],
        dnsNames: desiredRecordNames("example.com"),
        remoteDir: "/srv/app",
        phases: [...DEPLOY_PHASES],
      })
      expect(events.at(-1)).toMatchObject({ status: "cancelled", message: "Deployment was not confirmed" })
    })

    it("runs when the deployment is confirmed", async () => {
      const { coordinator } = harness({ confirm: () => true })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
    })
  })

  describe("run registry", () => {
    it("rejects a second active run for the same domain", () => {
      const { coordinator } = harness()
      const first = coordinator.createRun(request())

      expect(thrownBy(() => coordinator.createRun(request()))).toMatchObject({
        code: "RUN_IN_PROGRESS",
        statusCode: 409,
      })
      expect(() => coordinator.createRun(request({}, "example.org"))).not.toThrow()
      expect(coordinator.getRun(first.id)?.status).toBe("queued")
    })

    it("deploys the request as it was when the run was created", async () => {
      const { coordinator, sessionFactory } = harness()
      const input = request()
      const run = coordinator.createRun(input)

      input.target.domain = "example.org"
      input.target.address = "203.0.113.99"
      input.services = []

      expect(thrownBy(() => coordinator.createRun(request()))).toMatchObject({ code: "RUN_IN_PROGRESS" })
      const finished = await coordinator.startRun(run.id)

      expect(finished.status).toBe("completed")
      expect(finished.target).toMatchObject({ domain: "example.com", address: "203.0.113.10" })
      expect(finished.dnsRecords.map(record => record.name).sort()).toEqual(desiredRecordNames("example.com").sort())
      expect(sessionFactory.mock.calls[0][0]).toMatchObject({ domain: "example.com", address: "203.0.113.10" })
    })

    it("normalizes the domain before registering the run", async () => {
      const { coordinator } = harness()
      const run = coordinator.createRun(request({}, "Example.COM."))

      expect(run.target.domain).toBe("example.com")
      expect(thrownBy(() => coordinator.createRun(request()))).toMatchObject({ code: "RUN_IN_PROGRESS" })

      const finished = await coordinator.startRun(run.id)
      expect(finished.status).toBe("completed")
      expect(finished.dnsRecords).toHaveLength(5)
    })

    it("accepts the domain again once the run has finished", async () => {
      const { coordinator } = harness()

      await coordinator.deploy(request())

      expect(() => coordinator.createRun(request())).not.toThrow()
    })

    it("refuses to start a run twice", async () => {
      const { coordinator } = harness()
      const run = await coordinator.deploy(request())

      await expect(coordinator.startRun(run.id)).rejects.toMatchObject({ code: "RUN_IN_PROGRESS" })
      await expect(coordinator.startRun("unknown")).rejects.toMatchObject({ code: "RUN_NOT_FOUND", statusCode: 404 })
    })

    it.each([
      ["an address that is not an IP", { ...target, address: "server.example.com" }],
      ["a domain with a path", { ...target, domain: "example.com/admin" }],
      ["an empty domain", { ...target, domain: "" }],
    ])("rejects %s", (_case, badTarget) => {
      const { coordinator } = harness()

      expect(thrownBy(() => coordinator.createRun({ target: badTarget, services, localRoot }))).toMatchObject({
        code: "INVALID_TARGET",
      })
    })

    it("evicts finished runs only", async () => {
      const { coordinator } = harness()
      const queued = coordinator.createRun(request({}, "example.org"))
      const run = await coordinator.deploy(request())

      expect(coordinator.evictRun(queued.id)).toBe(false)
      expect(coordinator.evictRun(run.id)).toBe(true)
      expect(coordinator.getRun(run.id)).toBeUndefined()
      expect(coordinator.listRuns().map(entry => entry.id)).toEqual([queued.id])
    })

    it("hands out snapshots that do not change the run", async () => {
      const { coordinator } = harness()
      const run = await coordinator.deploy(request())

      run.completedPhases.length = 0
      run.dnsRecords.pop()

      const fresh = coordinator.getRun(run.id)
      expect(fresh?.completedPhases).toEqual([...DEPLOY_PHASES])
      expect(fresh?.dnsRecords).toHaveLength(5)
    })
  })

  describe("concurrent runs", () => {
    it("deploys two domains independently", async () => {
      const { coordinator, events, sessions } = harness({
        script: (session, deployTarget) => {
          if (deployTarget.domain === "example.org") {
            session.on("up -d --build", { exitCode: 1, stderr: "build failed" })
          }
        },
      })

      const [com, org] = await Promise.all([
        coordinator.deploy(request()),
        coordinator.deploy(request({}, "example.org")),
      ])

      expect(com.status).toBe("completed")
      expect(org.status).toBe("failed")
      expect(org.phase).toBe("orchestrate")
      expect(phasesStarted(events, com.id)).toEqual([...DEPLOY_PHASES])
      expect(phasesStarted(events, org.id)).toEqual(["connect", "dns", "host_prep", "transfer", "orchestrate"])
      expect(sessions).toHaveLength(2)
      expect(sessions.every(session => session.closeCount === 1)).toBe(true)
    })

    it("keeps delivering events when a listener throws", async () => {
      const { coordinator, events } = harness()
      coordinator.subscribe(() => {
        throw new Error("listener bug")
      })

      const run = await coordinator.deploy(request())

      expect(run.status).toBe("completed")
      expect(statuses(events)).toEqual(["queued", "running", "completed"])
    })
  })

  describe("stack operations", () => {
    it("reads status over a fresh session and closes it", async () => {
      const { coordinator, sessions } = harness({
        script: session => session.on(/ ps$/, { stdout: "web running\n" }),
      })

      await expect(coordinator.status(target)).resolves.toBe("web running\n")
      expect(sessions[0].closeCount).toBe(1)
    })

    it("closes the session when a stack operation fails", async () => {
      const { coordinator, sessions } = harness({
        script: session => session.on("logs --tail 100", { exitCode: 1, stderr: "no such service" }),
      })

      await expect(coordinator.logs(target)).rejects.toThrow("Cannot read logs: no such service")
      expect(sessions[0].closeCount).toBe(1)
    })

    it("stops the stack", async () => {
      const { coordinator, sessions } = harness()

      await coordinator.stop(target)

      expect(sessions[0].commands).toEqual(["cd /srv/app && docker compose -f docker-compose.prod.yml down"])
      expect(sessions[0].closeCount).toBe(1)
    })

    it("closes the follow session when the consumer stops", async () => {
      const { coordinator, sessions } = harness({
        script: session => {
          session.streamChunks = ["a\n", "b\n"]
        },
      })
      const controller = new AbortController()
      const received: string[] = []

      for await (const chunk of coordinator.followLogs(target, { signal: controller.signal })) {
        received.push(chunk)
      }

      expect(received).toEqual(["a\n", "b\n"])
      expect(sessions[0].closeCount).toBe(1)
    })

    it("cleans up subdomain records after a deploy", async () => {
      const { coordinator, provider } = harness()
      await coordinator.deploy(request())

      await expect(coordinator.cleanupDns("example.com")).resolves.toBe(3)
      expect(provider.records.map(record => record.name)).toEqual(["example.com", "www.example.com"])
    })

    it("has nothing to clean up without a provider", async () => {
      const { coordinator } = harness({ dns: false })

      await expect(coordinator.cleanupDns("example.com")).resolves.toBe(0)
    })
  })
})
