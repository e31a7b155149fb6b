/**
 * Deploy Controller - deployment pipeline for a container stack on one host
 *
 * A run moves through fixed phases, each a hard boundary:
 * connect → dns → host_prep → transfer → orchestrate → verify
 *
 * @packageDocumentation
 */

export { DeploymentCoordinator, type DeploymentCoordinatorOptions, sourceDirectories } from "./coordinator.js"
export type {
  CommandResult,
  DeployPhase,
  DeployPlan,
  DeployRequest,
  DeploymentRun,
  DeploymentTarget,
  DnsRecord,
  DnsRecordType,
  DnsZone,
  ExecuteOptions,
  ReconcileAction,
  ReconcileOutcome,
  RunStatus,
  ServiceDescriptor,
  SshAuth,
  VerificationReport,
} from "./types.js"

// Errors
export {
  AuthenticationError,
  CancelledError,
  ConnectionError,
  DeploymentError,
  type DeploymentErrorCode,
  DNSProviderError,
  isDeploymentError,
  ManifestRenderError,
  OrchestrationError,
  RemoteCommandError,
  RemoteCommandTimeoutError,
  TransferError,
  ZoneNotFoundError,
} from "./errors.js"

// Remote sessions
export { BaseRemoteSession, type RemoteSession, type SessionFactory } from "./session/remote-session.js"
export { createSshSessionFactory, SshSession, type SshSessionOptions } from "./session/ssh-session.js"
export {
  createCredentialResolverFromEnv,
  type CredentialResolver,
  DefaultCredentialResolver,
  type DefaultCredentialResolverOptions,
  expandHome,
  type ResolvedCredentials,
} from "./session/credentials.js"

// DNS
export type { DnsProvider, RecordInput, ZonePage } from "./dns/provider.js"
export {
  DnsReconciler,
  type DnsReconcilerOptions,
  desiredRecordNames,
  type HostResolver,
  type ReconcileOptions,
  recordTypeFor,
  systemResolver,
} from "./dns/reconciler.js"
export {
  CLOUDFLARE_API_BASE,
  CloudflareDnsProvider,
  type CloudflareDnsProviderOptions,
  createCloudflareProviderFromEnv,
} from "./dns/cloudflare.js"

// Executors
export { ArtifactTransfer, type TransferPlan, type TransferResult } from "./executors/transfer.js"
export { generateSecret, HostPreparer, type HostPrepResult, renderEnvFile } from "./executors/host.js"
export {
  CERTIFICATE_PENDING_WARNING,
  ContainerOrchestrator,
  type ContainerOrchestratorOptions,
  detectEdgeSignal,
  type LogOptions,
  type RenderedArtifacts,
} from "./executors/containers.js"

// Rendering
export { renderManifest, volumeName } from "./render/compose.js"
export { acmeEmail, RATE_LIMITED_LABEL, renderEdgeConfig } from "./render/caddy.js"
export { type PublicRoute, publicLabels, type ValidatedStack, validateServices } from "./render/validate.js"

// Engine
export { EventChannel, type EventListener } from "./engine/event-channel.js"
export { type RunHandle, RunRegistry } from "./engine/run-registry.js"
export { RUN_STATES, type RunContext, RunStateMachine } from "./engine/state-machine.js"
