// Core type definitions for the platform orchestrator

export type PhaseStatus =
  | 'Pending'
  | 'Applying'
  | 'Waiting'
  | 'Succeeded'
  | 'Failed'
  | 'Skipped'
  | 'Fatal';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
}

export interface ManifestMetadata {
  name: string;
  namespace?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  uid?: string;
  resourceVersion?: string;
  generation?: number;
  finalizers?: string[];
}

/**
 * A declarative object as the orchestration platform stores it. Everything
 * beyond apiVersion, kind and metadata is opaque to the orchestrator.
 */
export interface KubernetesManifest {
  apiVersion: string;
  kind: string;
  metadata: ManifestMetadata;
  [key: string]: unknown;
}

export interface ResourceDescriptor {
  kind: string;
  /** metadata.name of the object */
  identifier: string;
  /** Undefined for cluster-scoped kinds */
  namespace?: string;
  payload: KubernetesManifest;
  idempotencyKey: string;
  required: boolean;
}

export type ReadinessCondition =
  | 'available'
  | 'established'
  | 'materialized'
  | 'synced'
  | 'ready'
  | 'exists';

export interface ReadinessSelector {
  name?: string;
  labels?: Record<string, string>;
}

export interface ReadinessCheck {
  targetKind: string;
  apiVersion: string;
  namespace?: string;
  selector: ReadinessSelector;
  condition: ReadinessCondition;
  timeoutMs: number;
  required: boolean;
}

export interface SecretDestination {
  name: string;
  namespace: string;
}

export interface SecretBinding {
  consumerIdentity: string;
  /** KV mount the secret lives under */
  mount: string;
  secretPath: string;
  destination: SecretDestination;
  refreshInterval: string;
  /** Initial material, written only when the path has no current version */
  seed?: Record<string, string>;
}

export type SecretsAccess = 'read' | 'read-write';

export interface SecretsConsumer {
  name: string;
  serviceAccount: string;
  namespace: string;
  access: SecretsAccess;
  mount: string;
}

export interface SecretsBootstrapSpec {
  authPath: string;
  kubernetesHost: string;
  audience?: string;
  consumers: SecretsConsumer[];
  bindings: SecretBinding[];
}

export interface GitOpsRegistration {
  name: string;
  namespace: string;
  sourceRef: { kind: string; name: string; namespace?: string };
  path: string;
  interval: string;
  prune: boolean;
  targetNamespace?: string;
  required: boolean;
}

export interface Phase {
  name: string;
  resources: ResourceDescriptor[];
  dependsOn: string[];
  healthChecks: ReadinessCheck[];
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  optional: boolean;
  /** Present only on the secrets bootstrap phase */
  secrets?: SecretsBootstrapSpec;
  gitops?: GitOpsRegistration;
}

export interface ExecutionState {
  phaseName: string;
  status: PhaseStatus;
  attempt: number;
  lastError?: string;
}

export type ResourceAction = 'created' | 'updated' | 'unchanged' | 'recreated' | 'failed';

export interface ResourceOutcome {
  identity: string;
  action: ResourceAction;
  required: boolean;
  attempts: number;
  error?: string;
}

export type GateOutcome = 'Ready' | 'TimedOut' | 'Skipped';

export interface CheckOutcome {
  check: ReadinessCheck;
  target: string;
  state: GateOutcome;
  reason?: string;
}

export interface GateResult {
  outcome: GateOutcome;
  checks: CheckOutcome[];
}

export interface DeploymentError {
  code: string;
  message: string;
  phase?: string;
  resource?: string;
  remediation?: string;
}

export interface PhaseResult {
  phase: string;
  status: PhaseStatus;
  resources: ResourceOutcome[];
  gate?: GateResult;
  warnings: string[];
  errors: DeploymentError[];
  durationMs: number;
}

export interface DeploymentMetadata {
  runId: string;
  platform: string;
  startedAt: Date;
  duration?: number;
}

export interface DeploymentResult {
  success: boolean;
  exitCode: number;
  order: string[];
  states: ExecutionState[];
  phases: PhaseResult[];
  errors: DeploymentError[];
  metadata: DeploymentMetadata;
}

export interface PlatformSettings {
  name: string;
  context?: string;
  namespace: string;
  pollIntervalMs: number;
  reconcileIntervalMs: number;
  concurrency: number;
  conflictGraceMs: number;
  deleteGraceMs: number;
}

/**
 * The compiled, validated deployment plan. Built once at startup and never
 * mutated during a run.
 */
export interface PlatformPlan {
  platform: PlatformSettings;
  phases: Phase[];
  secretsAddress?: string;
}
