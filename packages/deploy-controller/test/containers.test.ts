import { silentLogger } from "@stackship/logger"
import type { ServiceDescriptor } from "@stackship/shared"
import { describe, expect, it } from "vitest"
import { OrchestrationError } from "../src/errors.js"
import { CERTIFICATE_PENDING_WARNING, ContainerOrchestrator, detectEdgeSignal } from "../src/executors/containers.js"
import { FakeRemoteSession } from "./fakes/fake-session.js"
import { target } from "./fixtures.js"

const COMPOSE = "cd /srv/app && docker compose -f docker-compose.prod.yml"

const services: ServiceDescriptor[] = [
  { name: "web", build: "./web", port: 5000, subdomain: "app", aliases: ["api"] },
  { name: "db", image: "postgres:16", port: 5432, internal: true },
]

function orchestrator() {
  return new ContainerOrchestrator({ projectDir: "/srv/app", settleDelayMs: 0, logger: silentLogger })
}

describe("detectEdgeSignal", () => {
  it("prefers the certificate signal", () => {
    expect(detectEdgeSignal("serving initial configuration\nCertificate obtained successfully")).toBe(
      "certificate_obtained",
    )
  })

  it("falls back to the serving signal", () => {
    expect(detectEdgeSignal('{"msg":"Serving HTTPS"}')).toBe("serving")
  })

  it("returns null without a signal", () => {
    expect(detectEdgeSignal("starting")).toBeNull()
  })
})

describe("ContainerOrchestrator", () => {
  it("writes both artifacts into the project directory", async () => {
    const session = new FakeRemoteSession()

    const artifacts = await orchestrator().writeArtifacts(session, services, target)

    expect([...session.files.keys()]).toEqual(["/srv/app/docker-compose.prod.yml", "/srv/app/Caddyfile.prod"])
    expect(session.files.get("/srv/app/docker-compose.prod.yml")).toBe(artifacts.manifest)
    expect(session.files.get("/srv/app/Caddyfile.prod")).toBe(artifacts.edgeConfig)
  })

  it("restarts with down then up --build", async () => {
    const session = new FakeRemoteSession()

    await orchestrator().restart(session)

    expect(session.commands).toEqual([`${COMPOSE} down`, `${COMPOSE} up -d --build`])
  })

  it("continues when down fails", async () => {
    const session = new FakeRemoteSession().on(/ down$/, { exitCode: 1, stderr: "no such project" })

    await expect(orchestrator().restart(session)).resolves.toBeUndefined()
    expect(session.commands).toHaveLength(2)
  })

  it("fails when up fails", async () => {
    const session = new FakeRemoteSession().on("up -d --build", { exitCode: 1, stderr: "build failed\n" })

    const error = await orchestrator()
      .restart(session)
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(OrchestrationError)
    expect(error).toMatchObject({ message: "Failed to start containers: build failed", exitCode: 1 })
  })

  it("reports a healthy edge with the public URLs", async () => {
    const session = new FakeRemoteSession()
      .on(/ ps$/, { stdout: "web   running\ncaddy running\n" })
      .on("logs --tail 50 caddy", { stdout: "certificate obtained successfully\n" })

    const report = await orchestrator().verify(session, target, services)

    expect(report).toEqual({
      healthy: true,
      signal: "certificate_obtained",
      statusText: "web   running\ncaddy running\n",
      edgeLogText: "certificate obtained successfully\n",
      warnings: [],
      urls: ["https://api.example.com", "https://app.example.com"],
    })
    expect(session.commands).toEqual([`${COMPOSE} ps`, `${COMPOSE} logs --tail 50 caddy`])
  })

  it("only warns when the edge has not confirmed yet", async () => {
    const session = new FakeRemoteSession().on(/ ps$/, { exitCode: 1 })

    const report = await orchestrator().verify(session, target, services)

    expect(report.healthy).toBe(false)
    expect(report.warnings).toEqual(["compose ps exited with 1", CERTIFICATE_PENDING_WARNING])
  })

  it("reads logs for one service", async () => {
    const session = new FakeRemoteSession().on("logs", { stdout: "line\n" })

    const output = await orchestrator().logs(session, { service: "web", tail: 20 })

    expect(output).toBe("line\n")
    expect(session.commands).toEqual([`${COMPOSE} logs --tail 20 web`])
  })

  it("throws when status cannot be read", async () => {
    const session = new FakeRemoteSession().on(/ ps$/, { exitCode: 14, stderr: "no configuration file" })

    await expect(orchestrator().status(session)).rejects.toThrow("Cannot read stack status: no configuration file")
  })

  it("stops the stack", async () => {
    const session = new FakeRemoteSession()

    await orchestrator().stop(session)

    expect(session.commands).toEqual([`${COMPOSE} down`])
  })

  it("stops following logs once aborted", async () => {
    const session = new FakeRemoteSession()
    session.streamChunks = ["first\n", "second\n", "third\n"]
    const controller = new AbortController()
    const received: string[] = []

    for await (const chunk of orchestrator().followLogs(session, { service: "web", signal: controller.signal })) {
      received.push(chunk)
      controller.abort()
    }

    expect(received).toEqual(["first\n"])
    expect(session.commands).toEqual([`${COMPOSE} logs -f --tail 0 web`])
  })

  it("quotes a project directory with spaces", async () => {
    const session = new FakeRemoteSession()
    const custom = new ContainerOrchestrator({ projectDir: "/srv/my app", settleDelayMs: 0, logger: silentLogger })

    await custom.stop(session)

    expect(session.commands).toEqual(["cd '/srv/my app' && docker compose -f docker-compose.prod.yml down"])
  })
})
