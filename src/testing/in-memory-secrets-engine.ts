import { PlatformError } from '../errors';
import {
  AuthMethod,
  KubernetesAuthRole,
  SecretsEngineClient,
  SecretsEngineHealth,
  SecretsMount,
  VersionedSecret
} from '../provisioning/types';

/**
 * SecretsEngineClient backed by maps. `writes` lists every mutating call as
 * `operation target`.
 */
export class InMemorySecretsEngine implements SecretsEngineClient {
  readonly writes: string[] = [];
  readonly authMethods: Record<string, AuthMethod> = {};
  readonly authConfigs: Record<string, Record<string, unknown>> = {};
  readonly mounts: Record<string, SecretsMount> = {};
  readonly policies: Record<string, string> = {};
  readonly roles: Record<string, KubernetesAuthRole> = {};
  private readonly secrets = new Map<string, VersionedSecret>();
  private sealedChecks = 0;

  /**
   * Report sealed for the next `count` health checks
   */
  sealFor(count: number): void {
    this.sealedChecks = count;
  }

  secret(mount: string, path: string): VersionedSecret | undefined {
    return this.secrets.get(`${mount}/${path}`);
  }

  async health(): Promise<SecretsEngineHealth> {
    if (this.sealedChecks > 0) {
      this.sealedChecks--;
      return { initialized: true, sealed: true };
    }
    return { initialized: true, sealed: false };
  }

  async listAuthMethods(): Promise<Record<string, AuthMethod>> {
    return { ...this.authMethods };
  }

  async enableAuthMethod(path: string, type: string): Promise<void> {
    this.writes.push(`enableAuth ${path}`);
    if (this.authMethods[path]) {
      throw new PlatformError('fatal', `path is already in use at ${path}/`, { statusCode: 400 });
    }
    this.authMethods[path] = { type };
  }

  async readAuthConfig(path: string): Promise<Record<string, unknown> | null> {
    return this.authConfigs[path] ?? null;
  }

  async writeAuthConfig(path: string, config: Record<string, unknown>): Promise<void> {
    this.writes.push(`writeAuthConfig ${path}`);
    this.authConfigs[path] = { ...config };
  }

  async listMounts(): Promise<Record<string, SecretsMount>> {
    return { ...this.mounts };
  }

  async mountKv(path: string): Promise<void> {
    this.writes.push(`mount ${path}`);
    this.mounts[path] = { type: 'kv', options: { version: '2' } };
  }

  async readPolicy(name: string): Promise<string | null> {
    return this.policies[name] ?? null;
  }

  async writePolicy(name: string, policy: string): Promise<void> {
    this.writes.push(`writePolicy ${name}`);
    this.policies[name] = policy;
  }

  async readRole(authPath: string, name: string): Promise<KubernetesAuthRole | null> {
    return this.roles[`${authPath}/${name}`] ?? null;
  }

  async writeRole(authPath: string, name: string, role: KubernetesAuthRole): Promise<void> {
    this.writes.push(`writeRole ${authPath}/${name}`);
    this.roles[`${authPath}/${name}`] = role;
  }

  async readSecret(mount: string, path: string): Promise<VersionedSecret | null> {
    return this.secrets.get(`${mount}/${path}`) ?? null;
  }

  async writeSecret(mount: string, path: string, data: Record<string, string>): Promise<number> {
    this.writes.push(`writeSecret ${mount}/${path}`);
    if (!this.mounts[mount]) {
      throw new PlatformError('fatal', `no handler for route "${mount}/data/${path}"`, { statusCode: 404 });
    }
    const version = (this.secrets.get(`${mount}/${path}`)?.version ?? 0) + 1;
    this.secrets.set(`${mount}/${path}`, { data: { ...data }, version });
    return version;
  }
}
