import { posix } from "node:path"
import { DEFAULTS, SERVICE_NAME_PATTERN, type ServiceDescriptor, SUBDOMAIN_LABEL_PATTERN } from "@stackship/shared"
import { ManifestRenderError } from "../errors.js"

/** Labels the edge config owns itself */
const RESERVED_LABELS = new Set(["www"])

export interface PublicRoute {
  /** Subdomain label, e.g. "api" */
  label: string
  service: ServiceDescriptor
}

export interface ValidatedStack {
  /** Sorted by name */
  services: ServiceDescriptor[]
  /** Sorted by label */
  routes: PublicRoute[]
  /** Target of the apex/www redirect, null when nothing is public */
  defaultRoute: PublicRoute | null
}

/** Code-point order, independent of the host locale */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function publicLabels(service: ServiceDescriptor): string[] {
  if (service.internal) return []
  return [...(service.subdomain ? [service.subdomain] : []), ...(service.aliases ?? [])]
}

/**
 * Workspace-relative path as compose expects it ("./web").
 * Absolute paths and parent traversal are rejected.
 */
export function relativeSource(service: string, path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"))
  if (posix.isAbsolute(normalized) || normalized === ".." || normalized.startsWith("../") || normalized === ".") {
    throw new ManifestRenderError(`Service "${service}" path must stay inside the workspace: ${path}`)
  }
  return `./${normalized.replace(/\/$/, "")}`
}

/**
 * Check descriptor invariants shared by the manifest and edge config.
 *
 * @throws ManifestRenderError on the first violation
 */
export function validateServices(services: ServiceDescriptor[]): ValidatedStack {
  const byName = new Map<string, ServiceDescriptor>()

  for (const service of services) {
    if (!SERVICE_NAME_PATTERN.test(service.name)) {
      throw new ManifestRenderError(`Invalid service name: "${service.name}"`)
    }
    if (service.name === DEFAULTS.EDGE_SERVICE_NAME) {
      throw new ManifestRenderError(`Service name "${DEFAULTS.EDGE_SERVICE_NAME}" is reserved for the edge proxy`)
    }
    if (byName.has(service.name)) {
      throw new ManifestRenderError(`Duplicate service name: "${service.name}"`)
    }
    if (Boolean(service.build) === Boolean(service.image)) {
      throw new ManifestRenderError(`Service "${service.name}" needs exactly one of build or image`)
    }
    if (!Number.isInteger(service.port) || service.port < 1 || service.port > 65535) {
      throw new ManifestRenderError(`Service "${service.name}" has an invalid port: ${service.port}`)
    }
    if (service.internal && (service.subdomain || (service.aliases?.length ?? 0) > 0)) {
      throw new ManifestRenderError(`Internal service "${service.name}" cannot have a subdomain`)
    }
    byName.set(service.name, service)
  }

  const routes: PublicRoute[] = []
  const claimed = new Map<string, string>()
  const defaults: ServiceDescriptor[] = []

  for (const service of byName.values()) {
    for (const dependency of service.dependsOn ?? []) {
      if (dependency === service.name) {
        throw new ManifestRenderError(`Service "${service.name}" cannot depend on itself`)
      }
      if (!byName.has(dependency)) {
        throw new ManifestRenderError(`Service "${service.name}" depends on unknown service "${dependency}"`)
      }
    }

    for (const label of publicLabels(service)) {
      if (!SUBDOMAIN_LABEL_PATTERN.test(label) || RESERVED_LABELS.has(label)) {
        throw new ManifestRenderError(`Service "${service.name}" has an invalid subdomain: "${label}"`)
      }
      const owner = claimed.get(label)
      if (owner) {
        throw new ManifestRenderError(`Subdomain "${label}" is claimed by both "${owner}" and "${service.name}"`)
      }
      claimed.set(label, service.name)
      routes.push({ label, service })
    }

    if (service.default) defaults.push(service)
  }

  if (defaults.length > 1) {
    throw new ManifestRenderError(`Only one default service allowed, got: ${defaults.map(s => s.name).join(", ")}`)
  }

  const sortedServices = [...byName.values()].sort((a, b) => compareStrings(a.name, b.name))
  routes.sort((a, b) => compareStrings(a.label, b.label))

  return { services: sortedServices, routes, defaultRoute: pickDefaultRoute(sortedServices, routes, defaults[0]) }
}

function pickDefaultRoute(
  services: ServiceDescriptor[],
  routes: PublicRoute[],
  explicit: ServiceDescriptor | undefined,
): PublicRoute | null {
  const target = explicit ?? services.find(service => publicLabels(service).length > 0)
  if (!target) return null
  if (publicLabels(target).length === 0) {
    throw new ManifestRenderError(`Default service "${target.name}" has no public subdomain`)
  }
  // the primary subdomain wins over aliases
  const label = target.subdomain ?? publicLabels(target)[0]
  return routes.find(route => route.label === label) ?? null
}
