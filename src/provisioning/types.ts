// Provisioning-specific types
import { ResourceRef } from '../config/naming';
import { KubernetesManifest } from '../types';

export interface ListOptions {
  namespace?: string;
  labelSelector?: Record<string, string>;
}

export interface DeleteOptions {
  gracePeriodSeconds?: number;
}

/**
 * Orchestration platform operations used by the executor, readiness gate,
 * reconciler and teardown. Implementations throw PlatformError.
 */
export interface PlatformClient {
  /** Live object, or null when absent */
  get(ref: ResourceRef): Promise<KubernetesManifest | null>;
  create(manifest: KubernetesManifest): Promise<KubernetesManifest>;
  update(manifest: KubernetesManifest): Promise<KubernetesManifest>;
  /** Resolves false when the object was already absent */
  delete(ref: ResourceRef, options?: DeleteOptions): Promise<boolean>;
  list(apiVersion: string, kind: string, options?: ListOptions): Promise<KubernetesManifest[]>;
}

export interface SecretsEngineHealth {
  initialized: boolean;
  sealed: boolean;
}

export interface AuthMethod {
  type: string;
}

export interface SecretsMount {
  type: string;
  options?: Record<string, string>;
}

export interface KubernetesAuthRole {
  bound_service_account_names: string[];
  bound_service_account_namespaces: string[];
  policies: string[];
  audience?: string;
  ttl?: string;
}

export interface VersionedSecret {
  data: Record<string, string>;
  version: number;
}

/**
 * Secrets engine operations used by the bootstrap coordinator. Paths are
 * given without leading or trailing slashes.
 */
export interface SecretsEngineClient {
  health(): Promise<SecretsEngineHealth>;
  listAuthMethods(): Promise<Record<string, AuthMethod>>;
  enableAuthMethod(path: string, type: string): Promise<void>;
  readAuthConfig(path: string): Promise<Record<string, unknown> | null>;
  writeAuthConfig(path: string, config: Record<string, unknown>): Promise<void>;
  listMounts(): Promise<Record<string, SecretsMount>>;
  mountKv(path: string): Promise<void>;
  readPolicy(name: string): Promise<string | null>;
  writePolicy(name: string, policy: string): Promise<void>;
  readRole(authPath: string, name: string): Promise<KubernetesAuthRole | null>;
  writeRole(authPath: string, name: string, role: KubernetesAuthRole): Promise<void>;
  readSecret(mount: string, path: string): Promise<VersionedSecret | null>;
  writeSecret(mount: string, path: string, data: Record<string, string>): Promise<number>;
}
