import { PlatformError, classifyHttpStatus, errorMessage } from '../errors';
import {
  AuthMethod,
  KubernetesAuthRole,
  SecretsEngineClient,
  SecretsEngineHealth,
  SecretsMount,
  VersionedSecret
} from './types';

export interface VaultManagerOptions {
  address: string;
  token: string;
  /** Vault Enterprise namespace */
  namespace?: string;
  fetch?: typeof fetch;
}

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_SOCKET']);

const normalizeBaseUrl = (value: string) => value.replace(/\/+$/, '');
const trimSlashes = (value: string) => value.replace(/^\/+|\/+$/g, '');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

const asStringArray = (value: unknown): string[] => {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string' && value.length > 0) {
    return value.split(',').map(item => item.trim());
  }
  return [];
};

const asStringRecord = (value: unknown): Record<string, string> => {
  const result: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      result[key] = typeof item === 'string' ? item : JSON.stringify(item);
    }
  }
  return result;
};

/**
 * HashiCorp Vault HTTP API client for the bootstrap coordinator
 */
export class VaultManager implements SecretsEngineClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: VaultManagerOptions) {
    this.baseUrl = `${normalizeBaseUrl(options.address)}/v1`;
    this.headers = {
      'X-Vault-Token': options.token,
      'Content-Type': 'application/json',
      ...(options.namespace ? { 'X-Vault-Namespace': options.namespace } : {})
    };
    this.fetchImpl = options.fetch ?? fetch;
  }

  async health(): Promise<SecretsEngineHealth> {
    // Override the status codes so sealed and uninitialised servers answer 200
    const body = await this.request('GET', 'sys/health?standbyok=true&sealedcode=200&uninitcode=200');
    return {
      initialized: isRecord(body) && body.initialized === true,
      sealed: !isRecord(body) || body.sealed !== false
    };
  }

  async listAuthMethods(): Promise<Record<string, AuthMethod>> {
    const body = await this.request('GET', 'sys/auth');
    return this.collectTyped(body);
  }

  async enableAuthMethod(path: string, type: string): Promise<void> {
    await this.request('POST', `sys/auth/${trimSlashes(path)}`, { type });
  }

  async readAuthConfig(path: string): Promise<Record<string, unknown> | null> {
    const body = await this.request('GET', `auth/${trimSlashes(path)}/config`, undefined, true);
    return isRecord(body) && isRecord(body.data) ? body.data : null;
  }

  async writeAuthConfig(path: string, config: Record<string, unknown>): Promise<void> {
    await this.request('POST', `auth/${trimSlashes(path)}/config`, config);
  }

  async listMounts(): Promise<Record<string, SecretsMount>> {
    const body = await this.request('GET', 'sys/mounts');
    const typed = this.collectTyped(body);
    const mounts: Record<string, SecretsMount> = {};
    const source = isRecord(body) && isRecord(body.data) ? body.data : body;

    for (const [path, mount] of Object.entries(typed)) {
      const raw = isRecord(source) ? source[`${path}/`] : undefined;
      mounts[path] = {
        type: mount.type,
        options: isRecord(raw) ? asStringRecord(raw.options) : undefined
      };
    }
    return mounts;
  }

  async mountKv(path: string): Promise<void> {
    await this.request('POST', `sys/mounts/${trimSlashes(path)}`, { type: 'kv', options: { version: '2' } });
  }

  async readPolicy(name: string): Promise<string | null> {
    const body = await this.request('GET', `sys/policies/acl/${name}`, undefined, true);
    if (isRecord(body) && isRecord(body.data) && typeof body.data.policy === 'string') {
      return body.data.policy;
    }
    return null;
  }

  async writePolicy(name: string, policy: string): Promise<void> {
    await this.request('PUT', `sys/policies/acl/${name}`, { policy });
  }

  async readRole(authPath: string, name: string): Promise<KubernetesAuthRole | null> {
    const body = await this.request('GET', `auth/${trimSlashes(authPath)}/role/${name}`, undefined, true);
    if (!isRecord(body) || !isRecord(body.data)) {
      return null;
    }
    const data = body.data;
    const policies = asStringArray(data.token_policies);
    return {
      bound_service_account_names: asStringArray(data.bound_service_account_names),
      bound_service_account_namespaces: asStringArray(data.bound_service_account_namespaces),
      policies: policies.length > 0 ? policies : asStringArray(data.policies),
      audience: typeof data.audience === 'string' && data.audience ? data.audience : undefined
    };
  }

  async writeRole(authPath: string, name: string, role: KubernetesAuthRole): Promise<void> {
    await this.request('POST', `auth/${trimSlashes(authPath)}/role/${name}`, { ...role });
  }

  async readSecret(mount: string, path: string): Promise<VersionedSecret | null> {
    const body = await this.request('GET', `${trimSlashes(mount)}/data/${trimSlashes(path)}`, undefined, true);
    if (!isRecord(body) || !isRecord(body.data) || !isRecord(body.data.data)) {
      return null;
    }
    const metadata = isRecord(body.data.metadata) ? body.data.metadata : {};
    return {
      data: asStringRecord(body.data.data),
      version: typeof metadata.version === 'number' ? metadata.version : 0
    };
  }

  async writeSecret(mount: string, path: string, data: Record<string, string>): Promise<number> {
    const body = await this.request('POST', `${trimSlashes(mount)}/data/${trimSlashes(path)}`, { data });
    return isRecord(body) && isRecord(body.data) && typeof body.data.version === 'number' ? body.data.version : 0;
  }

  /**
   * Vault lists mounts both at the top level and under `data`; paths carry
   * a trailing slash that is dropped here
   */
  private collectTyped(body: unknown): Record<string, { type: string }> {
    const source = isRecord(body) && isRecord(body.data) ? body.data : body;
    const result: Record<string, { type: string }> = {};
    if (!isRecord(source)) {
      return result;
    }
    for (const [path, entry] of Object.entries(source)) {
      if (path.endsWith('/') && isRecord(entry) && typeof entry.type === 'string') {
        result[trimSlashes(path)] = { type: entry.type };
      }
    }
    return result;
  }

  private async request(method: string, path: string, payload?: unknown, allowNotFound = false): Promise<unknown> {
    const resource = `vault:${path.split('?')[0]}`;
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/${path}`, {
        method,
        headers: this.headers,
        body: payload === undefined ? undefined : JSON.stringify(payload)
      });
    } catch (error) {
      const cause = error instanceof Error && isRecord(error.cause) ? error.cause : undefined;
      const code = typeof cause?.code === 'string' ? cause.code : undefined;
      throw new PlatformError(
        code && NETWORK_ERROR_CODES.has(code) ? 'transient' : 'fatal',
        `${method} ${resource} failed: ${errorMessage(error)}`,
        { reason: code, resource, cause: error }
      );
    }

    const text = await response.text();
    if (response.status === 404 && allowNotFound) {
      return null;
    }
    if (!response.ok) {
      const message = this.extractErrors(text);
      throw new PlatformError(
        classifyHttpStatus(response.status, undefined, message),
        `${method} ${resource} failed (${response.status}): ${message}`,
        { statusCode: response.status, resource }
      );
    }
    return text ? JSON.parse(text) : null;
  }

  private extractErrors(text: string): string {
    const fallback = text || 'no response body';
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return fallback;
    }
    if (isRecord(parsed) && Array.isArray(parsed.errors) && parsed.errors.length > 0) {
      return parsed.errors.map(String).join('; ');
    }
    return fallback;
  }
}
