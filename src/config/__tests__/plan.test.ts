import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { compilePlan } from '../plan';
import { validateAndNormalizeConfig } from '../validator';
import { IDEMPOTENCY_ANNOTATION, MANAGED_BY_LABEL, PHASE_LABEL } from '../naming';
import { ConfigurationError, CycleDetectedError } from '../../errors';
import { PlatformConfig } from '../types';

function config(sections: Record<string, unknown>): PlatformConfig {
  return validateAndNormalizeConfig({
    platform: {
      name: 'shop',
      namespace: 'shop',
      pollIntervalSeconds: 2,
      reconcileIntervalSeconds: 30,
      concurrency: 3,
      conflictGraceSeconds: 1,
      deleteGraceSeconds: 4
    },
    defaults: {
      timeoutSeconds: 90,
      retryPolicy: { maxAttempts: 4, initialDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 8000 }
    },
    ...sections
  });
}

const namespaceManifest = { apiVersion: 'v1', kind: 'Namespace', metadata: { name: 'shop', namespace: 'ignored' } };
const settingsManifest = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'settings' }, data: { mode: 'fast' } };

async function compileError(platformConfig: PlatformConfig): Promise<unknown> {
  return compilePlan(platformConfig, tmpdir()).catch((caught: unknown) => caught);
}

describe('compilePlan', () => {
  it('should convert platform settings to milliseconds', async () => {
    const plan = await compilePlan(config({ phases: [{ name: 'base' }] }), tmpdir());

    expect(plan.platform).toEqual({
      name: 'shop',
      context: undefined,
      namespace: 'shop',
      pollIntervalMs: 2000,
      reconcileIntervalMs: 30000,
      concurrency: 3,
      conflictGraceMs: 1000,
      deleteGraceMs: 4000
    });
    expect(plan.phases[0]).toMatchObject({ name: 'base', timeoutMs: 90000, optional: false, dependsOn: [] });
  });

  it('should stamp inline manifests with namespace, labels and idempotency key', async () => {
    const plan = await compilePlan(config({ phases: [{ name: 'base', resources: [namespaceManifest, settingsManifest] }] }), tmpdir());
    const [namespace, settings] = plan.phases[0].resources;

    expect(namespace.namespace).toBeUndefined();
    expect(namespace.payload.metadata.namespace).toBeUndefined();
    expect(settings.namespace).toBe('shop');
    expect(settings.payload.metadata.labels).toEqual({ [MANAGED_BY_LABEL]: 'platformctl', [PHASE_LABEL]: 'base' });
    expect(settings.payload.metadata.annotations?.[IDEMPOTENCY_ANNOTATION]).toBe(settings.idempotencyKey);
    expect(settings.payload.data).toEqual({ mode: 'fast' });
  });

  it('should resolve health checks against the phase and platform defaults', async () => {
    const plan = await compilePlan(config({
      phases: [{
        name: 'base',
        timeoutSeconds: 45,
        healthChecks: [
          { kind: 'CustomResourceDefinition', name: 'widgets.example.com', condition: 'established' },
          { kind: 'Pod', labels: { app: 'web' }, namespace: 'web', condition: 'ready', required: false, timeoutSeconds: 10 }
        ]
      }]
    }), tmpdir());

    expect(plan.phases[0].healthChecks).toEqual([
      {
        targetKind: 'CustomResourceDefinition',
        apiVersion: 'apiextensions.k8s.io/v1',
        namespace: undefined,
        selector: { name: 'widgets.example.com' },
        condition: 'established',
        timeoutMs: 45000,
        required: true
      },
      {
        targetKind: 'Pod',
        apiVersion: 'v1',
        namespace: 'web',
        selector: { labels: { app: 'web' } },
        condition: 'ready',
        timeoutMs: 10000,
        required: false
      }
    ]);
  });

  it('should merge a phase retry policy over the defaults', async () => {
    const plan = await compilePlan(config({ phases: [{ name: 'base', retryPolicy: { maxAttempts: 9 } }] }), tmpdir());

    expect(plan.phases[0].retryPolicy).toEqual({ maxAttempts: 9, initialDelayMs: 500, backoffMultiplier: 2, maxDelayMs: 8000 });
  });

  it('should register a phase with the GitOps reconciler', async () => {
    const plan = await compilePlan(config({
      phases: [{ name: 'apps', gitops: { sourceRef: { name: 'platform' }, path: './apps', targetNamespace: 'shop' } }]
    }), tmpdir());
    const [phase] = plan.phases;

    expect(phase.gitops?.name).toBe('apps');
    expect(phase.resources[0].payload).toMatchObject({
      apiVersion: 'kustomize.toolkit.fluxcd.io/v1',
      kind: 'Kustomization',
      metadata: { name: 'apps', namespace: 'flux-system' },
      spec: {
        interval: '5m',
        path: './apps',
        prune: true,
        sourceRef: { kind: 'GitRepository', name: 'platform' },
        targetNamespace: 'shop'
      }
    });
    expect(phase.healthChecks).toEqual([{
      targetKind: 'Kustomization',
      apiVersion: 'kustomize.toolkit.fluxcd.io/v1',
      namespace: 'flux-system',
      selector: { name: 'apps' },
      condition: 'synced',
      timeoutMs: 90000,
      required: true
    }]);
  });

  it('should put the secrets phase first', async () => {
    const plan = await compilePlan(config({
      secrets: {
        address: 'https://vault.test:8200',
        consumers: [{ name: 'api', serviceAccount: 'api', namespace: 'shop' }],
        bindings: [{ consumer: 'api', secretPath: 'db', destination: { name: 'api-db' }, seed: { password: 'test-secret' } }]
      },
      phases: [{ name: 'api', dependsOn: ['secrets'] }]
    }), tmpdir());
    const [secrets] = plan.phases;

    expect(plan.phases.map(phase => phase.name)).toEqual(['secrets', 'api']);
    expect(plan.secretsAddress).toBe('https://vault.test:8200');
    expect(secrets.secrets?.consumers).toEqual([{ name: 'api', serviceAccount: 'api', namespace: 'shop', access: 'read', mount: 'api' }]);
    expect(secrets.secrets?.bindings[0]).toEqual({
      consumerIdentity: 'api',
      mount: 'api',
      secretPath: 'db',
      destination: { name: 'api-db', namespace: 'shop' },
      refreshInterval: '1h',
      seed: { password: 'test-secret' }
    });
    expect(secrets.resources.map(descriptor => `${descriptor.kind}/${descriptor.identifier}`))
      .toEqual(['VaultAuth/api-vault-auth', 'VaultStaticSecret/api-db-sync']);
    expect(secrets.healthChecks.map(check => `${check.targetKind}/${check.namespace}/${check.selector.name}`))
      .toEqual(['Secret/shop/api-db']);
  });

  it('should collect every problem before failing', async () => {
    const error = await compileError(config({
      secrets: {
        consumers: [{ name: 'api', serviceAccount: 'api', namespace: 'shop' }],
        bindings: [{ consumer: 'billing', secretPath: 'db', destination: { name: 'billing-db' } }]
      },
      phases: [
        { name: 'one', resources: [settingsManifest, 'missing.yaml'] },
        { name: 'two', resources: [settingsManifest], healthChecks: [{ kind: 'Widget', name: 'w', condition: 'ready' }] }
      ]
    }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.issues.map(issue => issue.location)).toEqual([
        'secrets.bindings[0].consumer',
        'one.resources',
        'two.resources',
        'two.healthChecks[0]'
      ]);
      expect(error.issues[0].message).toBe('unknown consumer "billing"');
      expect(error.issues[2].message).toBe('v1/ConfigMap/shop/settings is already declared by phase "one"');
      expect(error.issues[3].message).toBe('apiVersion is required for kind Widget');
    }
  });

  it('should reject a dependency cycle', async () => {
    const error = await compileError(config({
      phases: [{ name: 'a', dependsOn: ['b'] }, { name: 'b', dependsOn: ['a'] }]
    }));

    expect(error).toBeInstanceOf(CycleDetectedError);
  });
});
