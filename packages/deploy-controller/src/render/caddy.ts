import { DEFAULTS, PATHS, recordName, type ServiceDescriptor } from "@stackship/shared"
import type { DeploymentTarget } from "../types.js"
import { type PublicRoute, validateServices } from "./validate.js"

/** Subdomain that gets a per-client request limit */
export const RATE_LIMITED_LABEL = "api"

export function acmeEmail(target: DeploymentTarget): string {
  return target.acmeEmail ?? `admin@${target.domain}`
}

function indent(lines: string[], depth = 1): string[] {
  const pad = "\t".repeat(depth)
  return lines.map(line => (line ? `${pad}${line}` : line))
}

function renderSite(route: PublicRoute, domain: string, email: string): string[] {
  const body = [`tls ${email}`]

  if (route.label === RATE_LIMITED_LABEL) {
    body.push(
      "rate_limit {",
      ...indent([
        `zone ${RATE_LIMITED_LABEL} {`,
        ...indent(["key {remote_host}", `events ${DEFAULTS.RATE_LIMIT_EVENTS}`, `window ${DEFAULTS.RATE_LIMIT_WINDOW}`]),
        "}",
      ]),
      "}",
    )
  }

  body.push(
    `reverse_proxy ${route.service.name}:${route.service.port}`,
    "log {",
    ...indent([`output file ${PATHS.EDGE_LOG_DIR}/${route.label}.log`]),
    "}",
  )

  return [`${recordName(route.label, domain)} {`, ...indent(body), "}"]
}

/**
 * Render Caddyfile.prod: one block per public hostname, plus an apex/www
 * redirect to the default service. Certificates are left to Caddy.
 *
 * @throws ManifestRenderError when a descriptor invariant is violated
 */
export function renderEdgeConfig(services: ServiceDescriptor[], target: DeploymentTarget): string {
  const { routes, defaultRoute } = validateServices(services)
  const email = acmeEmail(target)
  const { domain } = target

  const global = ["{", ...indent([`email ${email}`])]
  if (routes.some(route => route.label === RATE_LIMITED_LABEL)) {
    global.push(...indent(["order rate_limit before reverse_proxy"]))
  }
  global.push("}")

  const blocks = [global, ...routes.map(route => renderSite(route, domain, email))]

  if (defaultRoute) {
    blocks.push([
      `${domain}, ${recordName("www", domain)} {`,
      ...indent([`redir https://${recordName(defaultRoute.label, domain)}{uri} permanent`]),
      "}",
    ])
  }

  const header = [`# Edge configuration for ${domain}`, "# Certificates are obtained automatically by Caddy"]
  return `${header.join("\n")}\n\n${blocks.map(block => block.join("\n")).join("\n\n")}\n`
}
