import { createNamingService } from '../config/naming';
import { DescriptorStore } from '../descriptors/descriptor-store';
import {
  KubernetesManifest,
  Phase,
  PlatformSettings,
  ReadinessCheck,
  ResourceDescriptor,
  RetryPolicy,
  SecretsBootstrapSpec
} from '../types';
import { InMemoryPlatform } from './in-memory-platform';
import { InMemorySecretsEngine } from './in-memory-secrets-engine';

const naming = createNamingService();

/** Retries fast enough for tests */
export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1,
  backoffMultiplier: 2,
  maxDelayMs: 5
};

export function testSettings(overrides: Partial<PlatformSettings> = {}): PlatformSettings {
  return {
    name: 'test-platform',
    namespace: 'apps',
    pollIntervalMs: 5,
    reconcileIntervalMs: 20,
    concurrency: 2,
    conflictGraceMs: 1,
    deleteGraceMs: 0,
    ...overrides
  };
}

export function configMap(name: string, data: Record<string, string> = { key: 'value' }, namespace = 'apps'): KubernetesManifest {
  return { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name, namespace }, data };
}

export function deployment(name: string, namespace = 'apps'): KubernetesManifest {
  return {
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: { name, namespace },
    spec: { replicas: 1, selector: { matchLabels: { app: name } } }
  };
}

export function describeResource(phaseName: string, manifest: KubernetesManifest, required = true): ResourceDescriptor {
  return {
    kind: manifest.kind,
    identifier: manifest.metadata.name,
    namespace: manifest.metadata.namespace,
    payload: manifest,
    idempotencyKey: naming.idempotencyKey(phaseName, naming.refOf(manifest)),
    required
  };
}

export function availableCheck(name: string, overrides: Partial<ReadinessCheck> = {}): ReadinessCheck {
  return {
    targetKind: 'Deployment',
    apiVersion: 'apps/v1',
    namespace: 'apps',
    selector: { name },
    condition: 'available',
    timeoutMs: 200,
    required: true,
    ...overrides
  };
}

export interface PhaseOptions extends Partial<Omit<Phase, 'name' | 'resources'>> {
  manifests?: KubernetesManifest[];
}

export function makePhase(name: string, options: PhaseOptions = {}): Phase {
  const { manifests = [], ...rest } = options;
  return {
    name,
    resources: manifests.map(manifest => describeResource(name, manifest)),
    dependsOn: [],
    healthChecks: [],
    timeoutMs: 200,
    retryPolicy: FAST_RETRY,
    optional: false,
    ...rest
  };
}

/**
 * Mark every Deployment Available as soon as it is written, like a healthy
 * cluster would
 */
export function makeDeploymentsAvailable(platform: InMemoryPlatform): void {
  platform.react(object => {
    if (object.kind === 'Deployment') {
      platform.patchStored(naming.refOf(object), {
        status: { conditions: [{ type: 'Available', status: 'True' }] }
      });
    }
  });
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

/**
 * One read-only consumer with a single seeded binding
 */
export function secretsSpec(overrides: Partial<SecretsBootstrapSpec> = {}): SecretsBootstrapSpec {
  return {
    authPath: 'kubernetes',
    kubernetesHost: 'https://kubernetes.default.svc',
    consumers: [{ name: 'analytics', serviceAccount: 'analytics', namespace: 'apps', access: 'read', mount: 'analytics' }],
    bindings: [{
      consumerIdentity: 'analytics',
      mount: 'analytics',
      secretPath: 'db',
      destination: { name: 'analytics-db', namespace: 'apps' },
      refreshInterval: '1h',
      seed: { password: 'test-secret' }
    }],
    ...overrides
  };
}

export function makeSecretsPhase(spec: SecretsBootstrapSpec = secretsSpec(), checkTimeoutMs = 200): Phase {
  const store = new DescriptorStore('apps');
  const { manifests, checks } = store.secrets(spec, checkTimeoutMs);
  const phase = makePhase('secrets', { secrets: spec, healthChecks: checks });
  phase.resources = manifests.flatMap(manifest => store.register('secrets', manifest) ?? []);
  return phase;
}

/**
 * Play the secrets operator: every VaultStaticSecret written copies the
 * engine's current data into its destination Secret
 */
export function syncStaticSecrets(platform: InMemoryPlatform, engine: InMemorySecretsEngine): void {
  platform.react(object => {
    const spec = object.spec;
    if (object.kind !== 'VaultStaticSecret' || !isRecord(spec)) {
      return;
    }
    const destination = spec.destination;
    if (typeof spec.mount !== 'string' || typeof spec.path !== 'string' || !isRecord(destination) || typeof destination.name !== 'string') {
      return;
    }
    const secret = engine.secret(spec.mount, spec.path);
    if (!secret) {
      return;
    }
    const data = Object.fromEntries(
      Object.entries(secret.data).map(([key, value]) => [key, Buffer.from(value, 'utf8').toString('base64')])
    );
    platform.seed({
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: destination.name, namespace: object.metadata.namespace },
      data
    });
  });
}
