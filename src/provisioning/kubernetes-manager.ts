import * as k8s from '@kubernetes/client-node';
import { ResourceRef } from '../config/naming';
import { PlatformError, classifyHttpStatus, errorMessage } from '../errors';
import { KubernetesManifest } from '../types';
import { DeleteOptions, ListOptions, PlatformClient } from './types';

interface ObjectHeader {
  apiVersion: string;
  kind: string;
  metadata: { name: string; namespace: string };
}

/**
 * The subset of KubernetesObjectApi the manager calls. Declared separately so
 * tests can hand in a mock without a cluster.
 */
export interface ObjectApi {
  read(spec: ObjectHeader): Promise<{ body: k8s.KubernetesObject }>;
  create(spec: k8s.KubernetesObject): Promise<{ body: k8s.KubernetesObject }>;
  patch(
    spec: k8s.KubernetesObject,
    pretty?: string,
    dryRun?: string,
    fieldManager?: string,
    force?: boolean,
    options?: { headers: { [name: string]: string } }
  ): Promise<{ body: k8s.KubernetesObject }>;
  delete(
    spec: k8s.KubernetesObject,
    pretty?: string,
    dryRun?: string,
    gracePeriodSeconds?: number,
    orphanDependents?: boolean,
    propagationPolicy?: string
  ): Promise<unknown>;
  list(
    apiVersion: string,
    kind: string,
    namespace?: string,
    pretty?: string,
    exact?: boolean,
    exportt?: boolean,
    fieldSelector?: string,
    labelSelector?: string
  ): Promise<{ body: { items: k8s.KubernetesObject[] } }>;
}

const FIELD_MANAGER = 'platformctl';
const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'EPIPE', 'ESOCKETTIMEDOUT']);

/**
 * Orchestration platform client backed by the generic Kubernetes object API
 */
export class KubernetesManager implements PlatformClient {
  private api: ObjectApi;

  constructor(kubeConfig: k8s.KubeConfig, api?: ObjectApi) {
    this.api = api ?? k8s.KubernetesObjectApi.makeApiClient(kubeConfig);
  }

  async get(ref: ResourceRef): Promise<KubernetesManifest | null> {
    try {
      const { body } = await this.api.read(this.header(ref));
      return this.toManifest(body, ref);
    } catch (error) {
      const platformError = this.translate(error, ref, 'read');
      if (platformError.kind === 'not-found') {
        return null;
      }
      throw platformError;
    }
  }

  async create(manifest: KubernetesManifest): Promise<KubernetesManifest> {
    const ref = this.refOf(manifest);
    try {
      const { body } = await this.api.create(manifest);
      return this.toManifest(body, ref);
    } catch (error) {
      throw this.translate(error, ref, 'create');
    }
  }

  async update(manifest: KubernetesManifest): Promise<KubernetesManifest> {
    const ref = this.refOf(manifest);
    try {
      // Merge patch works for built-in and custom kinds alike; strategic
      // merge is rejected for custom resources with 415.
      const { body } = await this.api.patch(manifest, undefined, undefined, FIELD_MANAGER, undefined, {
        headers: { 'Content-Type': 'application/merge-patch+json' }
      });
      return this.toManifest(body, ref);
    } catch (error) {
      throw this.translate(error, ref, 'update');
    }
  }

  async delete(ref: ResourceRef, options: DeleteOptions = {}): Promise<boolean> {
    try {
      await this.api.delete(this.header(ref), undefined, undefined, options.gracePeriodSeconds, undefined, 'Background');
      return true;
    } catch (error) {
      const platformError = this.translate(error, ref, 'delete');
      if (platformError.kind === 'not-found') {
        return false;
      }
      throw platformError;
    }
  }

  async list(apiVersion: string, kind: string, options: ListOptions = {}): Promise<KubernetesManifest[]> {
    const labelSelector = options.labelSelector
      ? Object.entries(options.labelSelector).map(([key, value]) => `${key}=${value}`).join(',')
      : undefined;

    try {
      const { body } = await this.api.list(
        apiVersion,
        kind,
        options.namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        labelSelector
      );
      // Items of a typed list carry apiVersion and kind keys left undefined
      return body.items.map(item =>
        this.toManifest(
          { ...item, apiVersion: item.apiVersion ?? apiVersion, kind: item.kind ?? kind },
          { apiVersion, kind, name: item.metadata?.name ?? '' }
        )
      );
    } catch (error) {
      throw this.translate(error, { apiVersion, kind, name: '*', namespace: options.namespace }, 'list');
    }
  }

  private header(ref: ResourceRef): ObjectHeader {
    return {
      apiVersion: ref.apiVersion,
      kind: ref.kind,
      // An empty namespace falls back to the default for namespaced kinds
      // and is ignored for cluster-scoped ones.
      metadata: { name: ref.name, namespace: ref.namespace ?? '' }
    };
  }

  private refOf(manifest: KubernetesManifest): ResourceRef {
    return {
      apiVersion: manifest.apiVersion,
      kind: manifest.kind,
      name: manifest.metadata.name,
      namespace: manifest.metadata.namespace
    };
  }

  private toManifest(object: k8s.KubernetesObject, ref: ResourceRef): KubernetesManifest {
    const { apiVersion, kind, metadata } = object;
    if (!apiVersion || !kind || !metadata?.name) {
      throw new PlatformError('fatal', `Malformed object returned for ${ref.kind}/${ref.name}`, {
        resource: `${ref.kind}/${ref.name}`
      });
    }
    return { ...object, apiVersion, kind, metadata: { ...metadata, name: metadata.name } };
  }

  private translate(error: unknown, ref: ResourceRef, operation: string): PlatformError {
    if (error instanceof PlatformError) {
      return error;
    }

    const resource = `${ref.kind}/${ref.namespace ? `${ref.namespace}/` : ''}${ref.name}`;
    const details = readErrorDetails(error);

    if (details.statusCode !== undefined) {
      const kind = classifyHttpStatus(details.statusCode, details.reason, details.message);
      return new PlatformError(kind, `${operation} ${resource} failed (${details.statusCode}): ${details.message}`, {
        statusCode: details.statusCode,
        reason: details.reason,
        resource,
        cause: error
      });
    }

    if (details.code && NETWORK_ERROR_CODES.has(details.code)) {
      return new PlatformError('transient', `${operation} ${resource} failed: ${details.message}`, {
        reason: details.code,
        resource,
        cause: error
      });
    }

    return new PlatformError('fatal', `${operation} ${resource} failed: ${details.message}`, { resource, cause: error });
  }
}

interface ErrorDetails {
  statusCode?: number;
  reason?: string;
  code?: string;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Pull the status code and API status body out of an HttpError (or a plain
 * error carrying a network code)
 */
function readErrorDetails(error: unknown): ErrorDetails {
  if (!isRecord(error)) {
    return { message: errorMessage(error) };
  }

  const body = isRecord(error.body) ? error.body : undefined;
  const statusCode = typeof error.statusCode === 'number'
    ? error.statusCode
    : typeof body?.code === 'number' ? body.code : undefined;
  const reason = typeof body?.reason === 'string' ? body.reason : undefined;
  const bodyMessage = typeof body?.message === 'string' ? body.message : undefined;
  const code = typeof error.code === 'string' ? error.code : undefined;

  return {
    statusCode,
    reason,
    code,
    message: bodyMessage ?? errorMessage(error)
  };
}
