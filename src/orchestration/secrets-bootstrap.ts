import { ResourceNamingService } from '../config/naming';
import { CancelledError, PlatformError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { KubernetesAuthRole, SecretsEngineClient } from '../provisioning/types';
import {
  DeploymentError,
  ExecutionState,
  Phase,
  PhaseResult,
  SecretsAccess,
  SecretsBootstrapSpec,
  SecretsConsumer
} from '../types';
import { ExecutorOptions, PhaseExecutor } from './phase-executor';
import { RetryController } from './retry-controller';

export type SecretsBootstrapState =
  | 'Unregistered'
  | 'TrustRegistered'
  | 'RolesCreated'
  | 'SecretsDeclared'
  | 'SecretsSynchronized';

export const KUBERNETES_AUTH_TYPE = 'kubernetes';
const ROLE_TTL = '1h';

/**
 * Engine-side progress read back without changing anything. `failure` means
 * the engine cannot be set up as it stands; `missing` names the first step
 * a run would still have to perform.
 */
export interface SecretsInspection {
  state: SecretsBootstrapState;
  failure?: string;
  missing?: string;
}

export function setupFailureMessage(state: SecretsBootstrapState, reason: string): string {
  return `secrets engine setup failed in state ${state}: ${reason}`;
}

const unhealthyMessage = (initialized: boolean) => `secrets engine is ${initialized ? 'sealed' : 'not initialized'}`;
const authTakenMessage = (path: string, type: string) => `auth path ${path} is taken by a ${type} backend`;
const foreignMountMessage = (path: string, type: string) => `mount ${path} is a ${type} engine, not kv`;

/**
 * ACL policy granting one consumer access to its own KV v2 mount
 */
export function buildPolicy(mount: string, access: SecretsAccess): string {
  const data = access === 'read' ? ['read'] : ['create', 'read', 'update', 'delete'];
  const metadata = access === 'read' ? ['read', 'list'] : ['read', 'list', 'delete'];
  const quote = (values: string[]) => values.map(value => `"${value}"`).join(', ');
  return [
    `path "${mount}/data/*" {`,
    `  capabilities = [${quote(data)}]`,
    '}',
    '',
    `path "${mount}/metadata/*" {`,
    `  capabilities = [${quote(metadata)}]`,
    '}',
    ''
  ].join('\n');
}

function accessLevels(consumer: SecretsConsumer): SecretsAccess[] {
  return consumer.access === 'read-write' ? ['read', 'read-write'] : ['read'];
}

function sameRole(live: KubernetesAuthRole, desired: KubernetesAuthRole): boolean {
  const same = (a: string[], b: string[]) => [...a].sort().join(',') === [...b].sort().join(',');
  return same(live.bound_service_account_names, desired.bound_service_account_names)
    && same(live.bound_service_account_namespaces, desired.bound_service_account_namespaces)
    && same(live.policies, desired.policies)
    && (live.audience ?? '') === (desired.audience ?? '');
}

/**
 * Bridges platform identity into the secrets engine, then hands the
 * VaultAuth and VaultStaticSecret descriptors to the phase executor and
 * gates on the destination secrets. Every engine call is idempotent, so a
 * re-run against a configured engine performs reads only.
 */
export class SecretsBootstrapCoordinator {
  private current: SecretsBootstrapState = 'Unregistered';

  constructor(
    private readonly engine: SecretsEngineClient,
    private readonly executor: PhaseExecutor,
    private readonly retry: RetryController,
    private readonly naming: ResourceNamingService,
    private readonly logger: Logger = silentLogger
  ) {}

  get state(): SecretsBootstrapState {
    return this.current;
  }

  async run(phase: Phase, state: ExecutionState, options: ExecutorOptions): Promise<PhaseResult> {
    const spec = phase.secrets;
    if (!spec) {
      return this.executor.execute(phase, state, options);
    }

    const startTime = Date.now();
    const log = this.logger.child('secrets');
    this.current = 'Unregistered';
    state.status = 'Applying';

    try {
      await this.call(phase, state, options, 'wait for secrets engine', async () => {
        const health = await this.engine.health();
        if (!health.initialized || health.sealed) {
          throw new PlatformError('transient', unhealthyMessage(health.initialized), { resource: 'vault:sys/health' });
        }
      });

      await this.registerTrust(phase, state, spec, options);
      this.transition('TrustRegistered', log);

      await this.createRoles(phase, state, spec, options);
      await this.seedSecrets(phase, state, spec, options);
      this.transition('RolesCreated', log);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      state.status = 'Fatal';
      state.lastError = setupFailureMessage(this.current, errorMessage(error));
      log.error(state.lastError);
      const failure: DeploymentError = {
        code: 'SECRETS_BOOTSTRAP_FAILED',
        message: state.lastError,
        phase: phase.name,
        resource: error instanceof PlatformError ? error.resource : undefined,
        remediation: 'Check VAULT_ADDR, VAULT_TOKEN and that the token may manage auth methods, mounts and policies'
      };
      return {
        phase: phase.name,
        status: state.status,
        resources: [],
        warnings: [],
        errors: [failure],
        durationMs: Date.now() - startTime
      };
    }

    const result = await this.executor.execute(phase, state, options);
    if (result.resources.every(outcome => outcome.action !== 'failed' || !outcome.required)) {
      this.transition('SecretsDeclared', log);
    }
    if (result.status === 'Succeeded') {
      this.transition('SecretsSynchronized', log);
    }
    return { ...result, durationMs: Date.now() - startTime };
  }

  /**
   * Read the engine once and report how far its setup has come. Nothing is
   * written and nothing is retried; engine errors are reported as `failure`.
   */
  async inspect(spec: SecretsBootstrapSpec): Promise<SecretsInspection> {
    let reached: SecretsBootstrapState = 'Unregistered';
    try {
      const health = await this.engine.health();
      if (!health.initialized || health.sealed) {
        return { state: reached, failure: unhealthyMessage(health.initialized) };
      }

      const method = (await this.engine.listAuthMethods())[spec.authPath];
      if (!method) {
        return { state: reached, missing: `auth method ${spec.authPath} is not enabled` };
      }
      if (method.type !== KUBERNETES_AUTH_TYPE) {
        return { state: reached, failure: authTakenMessage(spec.authPath, method.type) };
      }
      const config = await this.engine.readAuthConfig(spec.authPath);
      if (config?.kubernetes_host !== spec.kubernetesHost) {
        return { state: reached, missing: `auth method ${spec.authPath} is not configured for ${spec.kubernetesHost}` };
      }
      reached = 'TrustRegistered';

      const mounts = await this.engine.listMounts();
      for (const consumer of spec.consumers) {
        const mount = mounts[consumer.mount];
        if (!mount) {
          return { state: reached, missing: `mount ${consumer.mount} is not enabled` };
        }
        if (mount.type !== 'kv') {
          return { state: reached, failure: foreignMountMessage(consumer.mount, mount.type) };
        }

        for (const access of accessLevels(consumer)) {
          const policyName = this.naming.policyName(consumer.name, access);
          if (await this.engine.readPolicy(policyName) !== buildPolicy(consumer.mount, access)) {
            return { state: reached, missing: `policy ${policyName} is missing or out of date` };
          }
          const roleName = this.naming.roleName(consumer.name, access);
          const liveRole = await this.engine.readRole(spec.authPath, roleName);
          if (!liveRole || !sameRole(liveRole, this.desiredRole(spec, consumer, policyName))) {
            return { state: reached, missing: `role ${roleName} is missing or out of date` };
          }
        }
      }
      return { state: 'RolesCreated' };
    } catch (error) {
      return { state: reached, failure: errorMessage(error) };
    }
  }

  private async registerTrust(
    phase: Phase,
    state: ExecutionState,
    spec: SecretsBootstrapSpec,
    options: ExecutorOptions
  ): Promise<void> {
    const methods = await this.call(phase, state, options, 'list auth methods', () => this.engine.listAuthMethods());
    const existing = methods[spec.authPath];
    if (!existing) {
      await this.call(phase, state, options, `enable auth ${spec.authPath}`, () =>
        this.engine.enableAuthMethod(spec.authPath, KUBERNETES_AUTH_TYPE)
      );
    } else if (existing.type !== KUBERNETES_AUTH_TYPE) {
      throw new PlatformError('fatal', authTakenMessage(spec.authPath, existing.type), {
        resource: `vault:sys/auth/${spec.authPath}`
      });
    }

    const live = await this.call(phase, state, options, 'read auth config', () => this.engine.readAuthConfig(spec.authPath));
    if (live?.kubernetes_host === spec.kubernetesHost) {
      return;
    }
    await this.call(phase, state, options, 'write auth config', () =>
      this.engine.writeAuthConfig(spec.authPath, { kubernetes_host: spec.kubernetesHost })
    );
  }

  private async createRoles(
    phase: Phase,
    state: ExecutionState,
    spec: SecretsBootstrapSpec,
    options: ExecutorOptions
  ): Promise<void> {
    const mounts = await this.call(phase, state, options, 'list mounts', () => this.engine.listMounts());

    for (const consumer of spec.consumers) {
      const mount = mounts[consumer.mount];
      if (!mount) {
        await this.call(phase, state, options, `mount ${consumer.mount}`, () => this.engine.mountKv(consumer.mount));
        mounts[consumer.mount] = { type: 'kv', options: { version: '2' } };
      } else if (mount.type !== 'kv') {
        throw new PlatformError('fatal', foreignMountMessage(consumer.mount, mount.type), {
          resource: `vault:sys/mounts/${consumer.mount}`
        });
      }

      for (const access of accessLevels(consumer)) {
        const policyName = this.naming.policyName(consumer.name, access);
        const policy = buildPolicy(consumer.mount, access);
        const livePolicy = await this.call(phase, state, options, `read policy ${policyName}`, () =>
          this.engine.readPolicy(policyName)
        );
        if (livePolicy !== policy) {
          await this.call(phase, state, options, `write policy ${policyName}`, () =>
            this.engine.writePolicy(policyName, policy)
          );
        }

        const roleName = this.naming.roleName(consumer.name, access);
        const role = this.desiredRole(spec, consumer, policyName);
        const liveRole = await this.call(phase, state, options, `read role ${roleName}`, () =>
          this.engine.readRole(spec.authPath, roleName)
        );
        if (!liveRole || !sameRole(liveRole, role)) {
          await this.call(phase, state, options, `write role ${roleName}`, () =>
            this.engine.writeRole(spec.authPath, roleName, role)
          );
        }
      }
    }
  }

  /**
   * Seed values are written only while the path has no version; material
   * rotated by operators is never overwritten
   */
  private async seedSecrets(
    phase: Phase,
    state: ExecutionState,
    spec: SecretsBootstrapSpec,
    options: ExecutorOptions
  ): Promise<void> {
    for (const binding of spec.bindings) {
      const seed = binding.seed;
      if (!seed) {
        continue;
      }
      const label = `${binding.mount}/${binding.secretPath}`;
      const existing = await this.call(phase, state, options, `read ${label}`, () =>
        this.engine.readSecret(binding.mount, binding.secretPath)
      );
      if (existing) {
        continue;
      }
      const version = await this.call(phase, state, options, `seed ${label}`, () =>
        this.engine.writeSecret(binding.mount, binding.secretPath, seed)
      );
      this.logger.child('secrets').info(`Seeded ${label} (version ${version})`);
    }
  }

  private desiredRole(spec: SecretsBootstrapSpec, consumer: SecretsConsumer, policyName: string): KubernetesAuthRole {
    return {
      bound_service_account_names: [consumer.serviceAccount],
      bound_service_account_namespaces: [consumer.namespace],
      policies: [policyName],
      ...(spec.audience ? { audience: spec.audience } : {}),
      ttl: ROLE_TTL
    };
  }

  private call<T>(
    phase: Phase,
    state: ExecutionState,
    options: ExecutorOptions,
    label: string,
    operation: () => Promise<T>
  ): Promise<T> {
    return this.retry.run(operation, {
      policy: phase.retryPolicy,
      label,
      signal: options.signal,
      state
    });
  }

  private transition(next: SecretsBootstrapState, log: Logger): void {
    log.debug(`${this.current} -> ${next}`);
    this.current = next;
  }
}
