// Configuration-specific types: the shape of platform.yml after validation
import { KubernetesManifest, ReadinessCondition, RetryPolicy, SecretsAccess } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface PlatformSection {
  name: string;
  context?: string;
  namespace: string;
  pollIntervalSeconds: number;
  reconcileIntervalSeconds: number;
  concurrency: number;
  conflictGraceSeconds: number;
  deleteGraceSeconds: number;
}

export interface DefaultsSection {
  timeoutSeconds: number;
  retryPolicy: RetryPolicy;
}

export interface HealthCheckConfig {
  kind: string;
  apiVersion?: string;
  name?: string;
  labels?: Record<string, string>;
  namespace?: string;
  condition: ReadinessCondition;
  timeoutSeconds?: number;
  required: boolean;
}

/** A manifest file, relative to the configuration file */
export interface ResourceFileEntry {
  path: string;
  required: boolean;
}

export type ResourceEntry = string | ResourceFileEntry | KubernetesManifest;

export interface GitOpsConfig {
  name?: string;
  namespace: string;
  sourceRef: { kind: string; name: string; namespace?: string };
  path: string;
  interval: string;
  prune: boolean;
  targetNamespace?: string;
  required: boolean;
}

export interface PhaseConfig {
  name: string;
  dependsOn: string[];
  resources: ResourceEntry[];
  healthChecks: HealthCheckConfig[];
  timeoutSeconds?: number;
  retryPolicy?: Partial<RetryPolicy>;
  optional: boolean;
  gitops?: GitOpsConfig;
}

export interface SecretsConsumerConfig {
  name: string;
  serviceAccount: string;
  namespace: string;
  access: SecretsAccess;
  mount?: string;
}

export interface SecretBindingConfig {
  consumer: string;
  secretPath: string;
  destination: { name: string; namespace?: string };
  refreshInterval: string;
  seed?: Record<string, string>;
}

export interface SecretsConfig {
  phase: string;
  dependsOn: string[];
  address?: string;
  auth: {
    path: string;
    kubernetesHost: string;
    audience?: string;
  };
  consumers: SecretsConsumerConfig[];
  bindings: SecretBindingConfig[];
  timeoutSeconds?: number;
  retryPolicy?: Partial<RetryPolicy>;
}

export interface PlatformConfig {
  platform: PlatformSection;
  defaults: DefaultsSection;
  secrets?: SecretsConfig;
  phases: PhaseConfig[];
}
