/**
 * ============================================================================
 * DEPLOYMENT CONFIGURATION - SINGLE SOURCE OF TRUTH
 * ============================================================================
 *
 * Every path, delay and default the deployment pipeline relies on lives here.
 * Always import from this file - never hardcode values.
 *
 * Organization:
 * - PATHS: Remote filesystem layout of a deployed stack
 * - DNS: Derived record names managed by the reconciler
 * - TIMEOUTS: Bounds on every suspension point
 * - DEFAULTS: Default values for providers, delays and the edge service
 */

/**
 * Env var takes precedence over the built-in value.
 * Empty strings count as unset.
 */
function configValue(envKey: string, fallback: string): string {
  if (typeof process !== "undefined") {
    const value = process.env[envKey]
    if (value) return value
  }
  return fallback
}

// =============================================================================
// Path Constants
// =============================================================================

export const PATHS = {
  /** Project directory on the remote host. Every artifact is placed below it. */
  REMOTE_PROJECT_DIR: configValue("STACKSHIP_REMOTE_DIR", "/opt/stackship"),

  /** Container manifest file name, relative to the project directory */
  MANIFEST_FILE: "docker-compose.prod.yml",

  /** Edge (Caddy) configuration file name, relative to the project directory */
  EDGE_CONFIG_FILE: "Caddyfile.prod",

  /** Secrets file consumed by compose interpolation */
  ENV_FILE: ".env",

  /** Where the edge container writes per-site access logs */
  EDGE_LOG_DIR: "/var/log/caddy",
} as const

// =============================================================================
// DNS Constants
// =============================================================================

export const DNS = {
  /**
   * Names reconciled for every deployment. The empty label is the apex.
   * Order matters: records are reconciled (and reported) in this order.
   */
  DESIRED_SUBDOMAINS: ["", "www", "app", "site", "api"],

  /** Names removed by DNS cleanup. Apex and www are left alone. */
  CLEANUP_SUBDOMAINS: ["app", "site", "api"],

  /** Page size used when scanning the full zone listing */
  ZONE_PAGE_SIZE: 50,
} as const

/**
 * Fully-qualified record name for a label under a domain.
 *
 * @example
 * recordName("", "example.com") // "example.com"
 * recordName("api", "example.com") // "api.example.com"
 */
export function recordName(label: string, domain: string): string {
  return label ? `${label}.${domain}` : domain
}

/**
 * Lowercase, without the trailing root dot. DNS providers list zones this way.
 *
 * @example
 * normalizeDomain("Example.COM.") // "example.com"
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, "")
}

// =============================================================================
// Timeout Configuration
// =============================================================================

export const TIMEOUTS = {
  /** SSH handshake timeout */
  SSH_CONNECT_MS: 10_000,

  /** Hard bound on a single remote command */
  REMOTE_COMMAND_MS: 15 * 60 * 1000,

  /** DNS provider HTTP request timeout */
  DNS_REQUEST_MS: 15_000,
} as const

// =============================================================================
// Default Values
// =============================================================================

export const DEFAULTS = {
  /** SSH login user when the target does not name one */
  SSH_USER: "root",

  /** SSH port when the target does not name one */
  SSH_PORT: 22,

  /** TTL (seconds) for created and updated records */
  DNS_TTL: 300,

  /** Whether records are proxied through the DNS provider's edge */
  DNS_PROXIED: true,

  /** Wait after reconciliation so verification does not race the provider */
  DNS_PROPAGATION_DELAY_MS: 5000,

  /** Wait after `up` before the stack is inspected */
  CONTAINER_SETTLE_DELAY_MS: 10_000,

  /** Edge service */
  EDGE_SERVICE_NAME: "caddy",
  EDGE_IMAGE: "caddy:2-alpine",

  /** Shared network every service joins */
  NETWORK_NAME: "app-network",

  /** Restart policy applied to every service */
  RESTART_POLICY: "unless-stopped",

  /** Requests allowed per window on the api subdomain */
  RATE_LIMIT_EVENTS: 100,
  RATE_LIMIT_WINDOW: "1m",

  /** Lines of edge log inspected during verification */
  VERIFY_LOG_TAIL: 50,

  /** Length of the generated database password */
  DB_PASSWORD_LENGTH: 32,

  /** Docker install script used when the host has no runtime */
  DOCKER_INSTALL_URL: "https://get.docker.com",
} as const
