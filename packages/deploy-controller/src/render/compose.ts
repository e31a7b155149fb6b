import { DEFAULTS, PATHS, type ServiceDescriptor } from "@stackship/shared"
import { stringify } from "yaml"
import type { DeploymentTarget } from "../types.js"
import { compareStrings, publicLabels, relativeSource, validateServices } from "./validate.js"

interface ComposeService {
  build?: string
  image?: string
  container_name: string
  hostname?: string
  restart: string
  ports?: string[]
  environment?: Record<string, string>
  volumes?: string[]
  networks: string[]
  depends_on?: string[]
}

interface ComposeFile {
  services: Record<string, ComposeService>
  networks: Record<string, { driver: string }>
  volumes: Record<string, Record<string, never>>
}

export function volumeName(service: ServiceDescriptor): string {
  return `${service.name}_data`
}

function sortedRecord(values: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {}
  for (const key of Object.keys(values).sort(compareStrings)) {
    sorted[key] = values[key]
  }
  return sorted
}

function renderService(service: ServiceDescriptor): ComposeService {
  const entry: ComposeService = {
    ...(service.build ? { build: relativeSource(service.name, service.build) } : { image: service.image }),
    container_name: service.name,
    hostname: service.name,
    restart: DEFAULTS.RESTART_POLICY,
    networks: [DEFAULTS.NETWORK_NAME],
  }

  if (service.environment && Object.keys(service.environment).length > 0) {
    entry.environment = sortedRecord(service.environment)
  }

  const volumes = (service.mounts ?? []).map(
    mount => `${relativeSource(service.name, mount.source)}:${mount.target}${mount.readOnly ? ":ro" : ""}`,
  )
  if (service.stateful) {
    volumes.push(`${volumeName(service)}:${service.dataPath ?? "/data"}`)
  }
  if (volumes.length > 0) {
    entry.volumes = volumes
  }

  if (service.dependsOn && service.dependsOn.length > 0) {
    entry.depends_on = [...new Set(service.dependsOn)].sort(compareStrings)
  }
  return entry
}

/**
 * Render docker-compose.prod.yml for a stack.
 * Pure: the same services and target always produce the same text.
 *
 * @throws ManifestRenderError when a descriptor invariant is violated
 */
export function renderManifest(services: ServiceDescriptor[], target: DeploymentTarget): string {
  const stack = validateServices(services)
  const routed = stack.services.filter(service => publicLabels(service).length > 0).map(service => service.name)

  const edge: ComposeService = {
    image: DEFAULTS.EDGE_IMAGE,
    container_name: DEFAULTS.EDGE_SERVICE_NAME,
    restart: DEFAULTS.RESTART_POLICY,
    ports: ["80:80", "443:443"],
    volumes: [
      `./${PATHS.EDGE_CONFIG_FILE}:/etc/caddy/Caddyfile`,
      "caddy_data:/data",
      "caddy_config:/config",
      `caddy_logs:${PATHS.EDGE_LOG_DIR}`,
    ],
    networks: [DEFAULTS.NETWORK_NAME],
  }
  if (routed.length > 0) {
    edge.depends_on = routed
  }

  const file: ComposeFile = {
    services: { [DEFAULTS.EDGE_SERVICE_NAME]: edge },
    networks: { [DEFAULTS.NETWORK_NAME]: { driver: "bridge" } },
    volumes: {},
  }

  const volumeNames = ["caddy_config", "caddy_data", "caddy_logs"]
  for (const service of stack.services) {
    file.services[service.name] = renderService(service)
    if (service.stateful) volumeNames.push(volumeName(service))
  }
  for (const name of volumeNames.sort(compareStrings)) {
    file.volumes[name] = {}
  }

  const header = `# Generated for ${target.domain}. Re-rendered on every deploy; local edits are overwritten.\n`
  return header + stringify(file, { lineWidth: 0, aliasDuplicateObjects: false })
}
