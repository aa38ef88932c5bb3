import { KubernetesManifest, SecretsAccess } from '../types';

export const MANAGED_BY_LABEL = 'app.kubernetes.io/managed-by';
export const MANAGED_BY_VALUE = 'platformctl';
export const PHASE_LABEL = 'platformctl.io/phase';
export const IDEMPOTENCY_ANNOTATION = 'platformctl.io/idempotency-key';

/**
 * Minimal reference to a platform object
 */
export interface ResourceRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

const CLUSTER_SCOPED_KINDS = new Set([
  'Namespace',
  'CustomResourceDefinition',
  'ClusterRole',
  'ClusterRoleBinding',
  'StorageClass',
  'PersistentVolume',
  'IngressClass',
  'PriorityClass',
  'MutatingWebhookConfiguration',
  'ValidatingWebhookConfiguration'
]);

const DEFAULT_API_VERSIONS: Record<string, string> = {
  Namespace: 'v1',
  Secret: 'v1',
  ConfigMap: 'v1',
  Service: 'v1',
  ServiceAccount: 'v1',
  Pod: 'v1',
  PersistentVolumeClaim: 'v1',
  Deployment: 'apps/v1',
  StatefulSet: 'apps/v1',
  DaemonSet: 'apps/v1',
  Job: 'batch/v1',
  Ingress: 'networking.k8s.io/v1',
  CustomResourceDefinition: 'apiextensions.k8s.io/v1',
  Kustomization: 'kustomize.toolkit.fluxcd.io/v1',
  GitRepository: 'source.toolkit.fluxcd.io/v1',
  HelmRelease: 'helm.toolkit.fluxcd.io/v2',
  VaultAuth: 'secrets.hashicorp.com/v1beta1',
  VaultStaticSecret: 'secrets.hashicorp.com/v1beta1'
};

/**
 * Resource identity and naming rules shared by the loader, executor,
 * reconciler and teardown.
 */
export class ResourceNamingService {
  private readonly maxLabelValueLength = 63;

  /**
   * Stable identity of an object: apiVersion/kind/namespace/name, with
   * `_cluster` standing in for the namespace of cluster-scoped kinds
   */
  identityOf(ref: ResourceRef): string {
    return `${ref.apiVersion}/${ref.kind}/${ref.namespace ?? '_cluster'}/${ref.name}`;
  }

  refOf(manifest: KubernetesManifest): ResourceRef {
    return {
      apiVersion: manifest.apiVersion,
      kind: manifest.kind,
      name: manifest.metadata.name,
      namespace: manifest.metadata.namespace
    };
  }

  /**
   * Derive the idempotency key for an object owned by a phase. Depends only
   * on the phase name and the object identity, so it is identical on every run.
   */
  idempotencyKey(phaseName: string, ref: ResourceRef): string {
    const identity = this.identityOf(ref);
    const prefix = this.sanitizeName(phaseName);
    return `${prefix}.${this.generateShortHash(`${phaseName}:${identity}`)}${this.generateShortHash(identity)}`;
  }

  isClusterScoped(kind: string): boolean {
    return CLUSTER_SCOPED_KINDS.has(kind);
  }

  defaultApiVersion(kind: string): string | undefined {
    return DEFAULT_API_VERSIONS[kind];
  }

  /**
   * Labels stamped on every applied object
   */
  managedLabels(phaseName: string): Record<string, string> {
    return {
      [MANAGED_BY_LABEL]: MANAGED_BY_VALUE,
      [PHASE_LABEL]: this.toLabelValue(phaseName)
    };
  }

  policyName(consumer: string, access: SecretsAccess): string {
    return `${this.sanitizeName(consumer)}-${access === 'read' ? 'read' : 'write'}`;
  }

  roleName(consumer: string, access: SecretsAccess): string {
    return this.policyName(consumer, access);
  }

  vaultAuthName(consumer: string): string {
    return `${this.sanitizeName(consumer)}-vault-auth`;
  }

  staticSecretName(destination: string): string {
    return `${this.sanitizeName(destination)}-sync`;
  }

  kustomizationName(phaseName: string): string {
    return this.toLabelValue(phaseName);
  }

  /**
   * Label values are limited to 63 characters of [a-z0-9A-Z-_.]
   */
  toLabelValue(value: string): string {
    return this.validateAndTruncate(this.sanitizeName(value), this.maxLabelValueLength);
  }

  /**
   * Sanitize name to be a DNS-1123 label
   * - Lowercase
   * - Replace invalid characters with hyphens
   * - Collapse consecutive hyphens
   */
  private sanitizeName(name: string): string {
    let sanitized = name.toLowerCase().replace(/[^a-z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (!sanitized) {
      sanitized = 'phase';
    }

    return sanitized;
  }

  /**
   * Truncate to the length limit, keeping a hash suffix for uniqueness
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength).replace(/-+$/, '') + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).padStart(6, '0').substring(0, 6);
  }
}

export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
