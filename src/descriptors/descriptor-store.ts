import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { parseAllDocuments } from 'yaml';
import {
  IDEMPOTENCY_ANNOTATION,
  ResourceNamingService,
  createNamingService
} from '../config/naming';
import { ConfigurationError, ConfigurationIssue, errorMessage } from '../errors';
import {
  GitOpsRegistration,
  KubernetesManifest,
  ManifestMetadata,
  ReadinessCheck,
  ResourceDescriptor,
  SecretsBootstrapSpec
} from '../types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const asStringMap = (value: unknown): Record<string, string> | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = String(item);
  }
  return result;
};

/**
 * Narrow a parsed document to a manifest, or describe what is wrong with it
 */
export function toManifest(document: unknown): KubernetesManifest | string {
  if (!isRecord(document)) {
    return 'document is not an object';
  }
  const { apiVersion, kind, metadata } = document;
  if (typeof apiVersion !== 'string' || !apiVersion) {
    return 'apiVersion is missing';
  }
  if (typeof kind !== 'string' || !kind) {
    return 'kind is missing';
  }
  if (!isRecord(metadata) || typeof metadata.name !== 'string' || !metadata.name) {
    return 'metadata.name is missing';
  }

  const labels = asStringMap(metadata.labels);
  const annotations = asStringMap(metadata.annotations);
  const normalized: ManifestMetadata = {
    name: metadata.name,
    ...(typeof metadata.namespace === 'string' ? { namespace: metadata.namespace } : {}),
    ...(labels ? { labels } : {}),
    ...(annotations ? { annotations } : {})
  };
  return { ...document, apiVersion, kind, metadata: normalized };
}

/**
 * Registry of declared artifacts by stable identity. Descriptors are
 * stamped with the managing labels and the idempotency annotation when they
 * are registered, and a given identity may belong to only one phase.
 */
export class DescriptorStore {
  private readonly owners = new Map<string, string>();
  private readonly issues: ConfigurationIssue[] = [];

  constructor(
    private readonly defaultNamespace: string,
    private readonly naming: ResourceNamingService = createNamingService()
  ) {}

  /**
   * Read one or more YAML documents from a manifest file. Empty documents
   * are skipped; malformed ones are recorded as issues against the phase.
   */
  async loadFile(phaseName: string, path: string, baseDir: string): Promise<KubernetesManifest[]> {
    const fullPath = resolve(baseDir, path);
    let content: string;
    try {
      content = await readFile(fullPath, 'utf-8');
    } catch (error) {
      this.issues.push({ location: `${phaseName}.resources`, message: `cannot read ${path}: ${errorMessage(error)}` });
      return [];
    }

    const manifests: KubernetesManifest[] = [];
    parseAllDocuments(content).forEach((document, index) => {
      if (document.errors.length > 0) {
        this.issues.push({
          location: `${phaseName}.resources`,
          message: `${path} document ${index + 1}: ${document.errors.map(error => error.message).join('; ')}`
        });
        return;
      }
      const parsed: unknown = document.toJS();
      if (parsed === null || parsed === undefined) {
        return;
      }
      const manifest = toManifest(parsed);
      if (typeof manifest === 'string') {
        this.issues.push({ location: `${phaseName}.resources`, message: `${path} document ${index + 1}: ${manifest}` });
        return;
      }
      manifests.push(manifest);
    });
    return manifests;
  }

  /**
   * Register a manifest as owned by a phase and return its descriptor
   */
  register(phaseName: string, manifest: KubernetesManifest, required = true): ResourceDescriptor | undefined {
    const payload = this.stamp(phaseName, manifest);
    const ref = this.naming.refOf(payload);
    const identity = this.naming.identityOf(ref);

    const owner = this.owners.get(identity);
    if (owner !== undefined) {
      this.issues.push({
        location: `${phaseName}.resources`,
        message: `${identity} is already declared by phase "${owner}"`
      });
      return undefined;
    }

    const descriptor: ResourceDescriptor = {
      kind: payload.kind,
      identifier: payload.metadata.name,
      namespace: payload.metadata.namespace,
      payload,
      idempotencyKey: this.naming.idempotencyKey(phaseName, ref),
      required
    };
    this.owners.set(identity, phaseName);
    return descriptor;
  }

  addIssue(issue: ConfigurationIssue): void {
    this.issues.push(issue);
  }

  /**
   * @throws ConfigurationError listing every issue recorded so far
   */
  assertValid(): void {
    if (this.issues.length > 0) {
      throw new ConfigurationError([...this.issues]);
    }
  }

  /**
   * Flux Kustomization registering a phase with the GitOps reconciler, and
   * the readiness check that waits for its sync
   */
  gitops(registration: GitOpsRegistration, timeoutMs: number): { manifest: KubernetesManifest; check: ReadinessCheck } {
    const apiVersion = this.naming.defaultApiVersion('Kustomization') ?? 'kustomize.toolkit.fluxcd.io/v1';
    const manifest: KubernetesManifest = {
      apiVersion,
      kind: 'Kustomization',
      metadata: { name: registration.name, namespace: registration.namespace },
      spec: {
        interval: registration.interval,
        path: registration.path,
        prune: registration.prune,
        sourceRef: {
          kind: registration.sourceRef.kind,
          name: registration.sourceRef.name,
          ...(registration.sourceRef.namespace ? { namespace: registration.sourceRef.namespace } : {})
        },
        ...(registration.targetNamespace ? { targetNamespace: registration.targetNamespace } : {})
      }
    };
    return {
      manifest,
      check: {
        targetKind: 'Kustomization',
        apiVersion,
        namespace: registration.namespace,
        selector: { name: registration.name },
        condition: 'synced',
        timeoutMs,
        required: registration.required
      }
    };
  }

  /**
   * VaultAuth objects per consumer and VaultStaticSecret objects per binding
   * for the Vault Secrets Operator, plus a materialized check per
   * destination secret
   */
  secrets(spec: SecretsBootstrapSpec, timeoutMs: number): { manifests: KubernetesManifest[]; checks: ReadinessCheck[] } {
    const apiVersion = this.naming.defaultApiVersion('VaultAuth') ?? 'secrets.hashicorp.com/v1beta1';
    const manifests: KubernetesManifest[] = [];
    const checks: ReadinessCheck[] = [];

    for (const consumer of spec.consumers) {
      manifests.push({
        apiVersion,
        kind: 'VaultAuth',
        metadata: { name: this.naming.vaultAuthName(consumer.name), namespace: consumer.namespace },
        spec: {
          method: 'kubernetes',
          mount: spec.authPath,
          kubernetes: {
            role: this.naming.roleName(consumer.name, 'read'),
            serviceAccount: consumer.serviceAccount,
            ...(spec.audience ? { audiences: [spec.audience] } : {})
          }
        }
      });
    }

    for (const binding of spec.bindings) {
      const consumer = spec.consumers.find(item => item.name === binding.consumerIdentity);
      if (!consumer) {
        continue;
      }
      const authName = this.naming.vaultAuthName(consumer.name);
      manifests.push({
        apiVersion,
        kind: 'VaultStaticSecret',
        metadata: {
          name: this.naming.staticSecretName(binding.destination.name),
          namespace: binding.destination.namespace
        },
        spec: {
          vaultAuthRef: binding.destination.namespace === consumer.namespace ? authName : `${consumer.namespace}/${authName}`,
          mount: binding.mount,
          type: 'kv-v2',
          path: binding.secretPath,
          refreshAfter: binding.refreshInterval,
          destination: { name: binding.destination.name, create: true }
        }
      });
      checks.push({
        targetKind: 'Secret',
        apiVersion: 'v1',
        namespace: binding.destination.namespace,
        selector: { name: binding.destination.name },
        condition: 'materialized',
        timeoutMs,
        required: true
      });
    }

    return { manifests, checks };
  }

  /**
   * Default the namespace of namespaced kinds, drop it from cluster-scoped
   * ones, then add the managing labels and the idempotency annotation
   */
  private stamp(phaseName: string, manifest: KubernetesManifest): KubernetesManifest {
    const clusterScoped = this.naming.isClusterScoped(manifest.kind);
    const metadata: ManifestMetadata = { ...manifest.metadata };
    if (clusterScoped) {
      delete metadata.namespace;
    } else {
      metadata.namespace = metadata.namespace ?? this.defaultNamespace;
    }

    const ref = {
      apiVersion: manifest.apiVersion,
      kind: manifest.kind,
      name: metadata.name,
      namespace: metadata.namespace
    };
    metadata.labels = { ...metadata.labels, ...this.naming.managedLabels(phaseName) };
    metadata.annotations = {
      ...metadata.annotations,
      [IDEMPOTENCY_ANNOTATION]: this.naming.idempotencyKey(phaseName, ref)
    };
    return { ...manifest, metadata };
  }
}
