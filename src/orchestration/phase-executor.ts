import pLimit from 'p-limit';
import { ResourceNamingService, ResourceRef } from '../config/naming';
import { CancelledError, PlatformError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PlatformClient } from '../provisioning/types';
import {
  DeploymentError,
  ExecutionState,
  GateResult,
  Phase,
  PhaseResult,
  ResourceAction,
  ResourceDescriptor,
  ResourceOutcome,
  RetryPolicy
} from '../types';
import { ReadinessGate } from './readiness-gate';
import { RetryController } from './retry-controller';
import { sleep } from './sleep';
import { structuralDiff } from './structural-diff';

export interface ExecutorOptions {
  concurrency: number;
  pollIntervalMs: number;
  /** Pause between deleting a conflicting object and recreating it */
  conflictGraceMs: number;
  signal?: AbortSignal;
}

export interface ApplyContext {
  phase: string;
  retryPolicy: RetryPolicy;
  /** Bound for waiting on a deleted object to disappear */
  timeoutMs: number;
  state?: ExecutionState;
}

export interface ApplyResult {
  outcome: ResourceOutcome;
  warnings: string[];
  error?: DeploymentError;
}

/**
 * Applies every resource of a phase, then blocks on the phase's readiness
 * checks. Resource failures are collected rather than thrown; the phase
 * fails only when a required resource or a required check fails.
 */
export class PhaseExecutor {
  constructor(
    private readonly platform: PlatformClient,
    private readonly gate: ReadinessGate,
    private readonly retry: RetryController,
    private readonly naming: ResourceNamingService,
    private readonly logger: Logger = silentLogger
  ) {}

  async execute(phase: Phase, state: ExecutionState, options: ExecutorOptions): Promise<PhaseResult> {
    const startTime = Date.now();
    const log = this.logger.child(phase.name);
    const failureStatus = phase.optional ? 'Failed' : 'Fatal';

    state.status = 'Applying';
    log.info(`Applying ${phase.resources.length} resource(s)`);
    const applied = await this.applyAll(phase, state, options);

    const warnings = applied.flatMap(result => result.warnings);
    const errors = applied.flatMap(result => (result.error ? [result.error] : []));
    const resources = applied.map(result => result.outcome);
    const requiredFailures = resources.filter(outcome => outcome.action === 'failed' && outcome.required);

    for (const outcome of resources) {
      if (outcome.action === 'failed' && !outcome.required) {
        warnings.push(`optional resource ${outcome.identity} failed: ${outcome.error ?? 'unknown error'}`);
      }
    }

    if (requiredFailures.length > 0) {
      state.status = failureStatus;
      state.lastError = requiredFailures.map(outcome => `${outcome.identity}: ${outcome.error ?? 'unknown error'}`).join('; ');
      log.error(`Phase failed: ${state.lastError}`);
      return this.result(phase, state, resources, undefined, warnings, errors, startTime);
    }

    state.status = 'Waiting';
    const gate = await this.gate.waitFor(phase.healthChecks, phase.timeoutMs, {
      pollIntervalMs: options.pollIntervalMs,
      signal: options.signal
    });

    for (const check of gate.checks) {
      if (!check.check.required && check.state === 'TimedOut') {
        warnings.push(`optional check ${check.target} not ready: ${check.reason ?? 'timed out'}`);
      }
    }

    if (gate.outcome === 'TimedOut') {
      const failed = gate.checks.filter(check => check.check.required && check.state === 'TimedOut');
      state.status = failureStatus;
      state.lastError = failed
        .map(check => `${check.target} not ${check.check.condition}: ${check.reason ?? 'timed out'}`)
        .join('; ');
      for (const check of failed) {
        errors.push({
          code: 'READINESS_TIMEOUT',
          message: `${check.target} did not become ${check.check.condition} within ${Math.round(check.check.timeoutMs / 1000)}s`,
          phase: phase.name,
          resource: check.target,
          remediation: `Inspect ${check.target} and its events on the platform`
        });
      }
      log.error(`Readiness gate failed: ${state.lastError}`);
      return this.result(phase, state, resources, gate, warnings, errors, startTime);
    }

    state.status = 'Succeeded';
    log.success(`Phase succeeded (${this.summarize(resources)})`);
    return this.result(phase, state, resources, gate, warnings, errors, startTime);
  }

  /**
   * Create-or-update one descriptor, resolving a conflict by deleting and
   * recreating the object. Transient failures are retried by the retry
   * controller; the number of delete/recreate rounds is bounded by the
   * same policy's maxAttempts.
   */
  async applyResource(
    descriptor: ResourceDescriptor,
    context: ApplyContext,
    options: Pick<ExecutorOptions, 'pollIntervalMs' | 'conflictGraceMs' | 'signal'>
  ): Promise<ApplyResult> {
    const ref = this.naming.refOf(descriptor.payload);
    const identity = this.naming.identityOf(ref);
    const log = this.logger.child(context.phase);
    const warnings: string[] = [];
    let attempts = 0;
    let recreations = 0;

    for (;;) {
      try {
        const action = await this.retry.run(
          async () => {
            attempts++;
            return this.createOrUpdate(descriptor, ref);
          },
          { policy: context.retryPolicy, label: `apply ${identity}`, signal: options.signal, state: context.state }
        );

        const finalAction: ResourceAction = recreations > 0 ? 'recreated' : action;
        log.debug(`${identity} ${finalAction}`);
        return {
          outcome: { identity, action: finalAction, required: descriptor.required, attempts },
          warnings
        };
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }

        if (this.retry.classify(error) === 'conflict' && recreations < Math.max(1, context.retryPolicy.maxAttempts)) {
          recreations++;
          const message = `${identity} conflicts with the live object (${errorMessage(error)}); deleting and recreating`;
          log.warn(message);
          warnings.push(message);
          try {
            await this.recreatePreparation(ref, identity, context, options);
            continue;
          } catch (recoveryError) {
            if (recoveryError instanceof CancelledError) {
              throw recoveryError;
            }
            return this.failed(descriptor, identity, context, attempts, recoveryError, warnings);
          }
        }

        return this.failed(descriptor, identity, context, attempts, error, warnings);
      }
    }
  }

  private async applyAll(phase: Phase, state: ExecutionState, options: ExecutorOptions): Promise<ApplyResult[]> {
    const limit = pLimit(Math.max(1, options.concurrency));
    const context: ApplyContext = {
      phase: phase.name,
      retryPolicy: phase.retryPolicy,
      timeoutMs: phase.timeoutMs,
      state
    };
    return Promise.all(phase.resources.map(descriptor => limit(() => this.applyResource(descriptor, context, options))));
  }

  private async createOrUpdate(descriptor: ResourceDescriptor, ref: ResourceRef): Promise<ResourceAction> {
    const live = await this.platform.get(ref);
    if (!live) {
      await this.platform.create(descriptor.payload);
      return 'created';
    }
    if (structuralDiff(descriptor.payload, live).length === 0) {
      return 'unchanged';
    }
    await this.platform.update(descriptor.payload);
    return 'updated';
  }

  /**
   * Delete the conflicting object, pause, and wait until the platform no
   * longer returns it
   */
  private async recreatePreparation(
    ref: ResourceRef,
    identity: string,
    context: ApplyContext,
    options: Pick<ExecutorOptions, 'pollIntervalMs' | 'conflictGraceMs' | 'signal'>
  ): Promise<void> {
    await this.retry.run(() => this.platform.delete(ref), {
      policy: context.retryPolicy,
      label: `delete ${identity}`,
      signal: options.signal
    });
    await sleep(options.conflictGraceMs, options.signal);

    const deadline = Date.now() + context.timeoutMs;
    while (await this.platform.get(ref)) {
      if (Date.now() >= deadline) {
        throw new PlatformError('fatal', `${identity} still present ${Math.round(context.timeoutMs / 1000)}s after deletion`, {
          resource: identity
        });
      }
      await sleep(options.pollIntervalMs, options.signal);
    }
  }

  private failed(
    descriptor: ResourceDescriptor,
    identity: string,
    context: ApplyContext,
    attempts: number,
    error: unknown,
    warnings: string[]
  ): ApplyResult {
    const message = errorMessage(error);
    const kind = this.retry.classify(error);
    this.logger.child(context.phase).error(`${identity}: ${message}`);
    return {
      outcome: { identity, action: 'failed', required: descriptor.required, attempts, error: message },
      warnings,
      error: {
        code: kind === 'transient' ? 'RETRIES_EXHAUSTED' : kind === 'conflict' ? 'CONFLICT_UNRESOLVED' : 'RESOURCE_APPLY_FAILED',
        message,
        phase: context.phase,
        resource: identity,
        remediation: kind === 'fatal'
          ? 'Check the manifest and the credentials used for the platform'
          : 'Re-run deploy once the platform is healthy'
      }
    };
  }

  private summarize(resources: ResourceOutcome[]): string {
    const counts = new Map<ResourceAction, number>();
    for (const outcome of resources) {
      counts.set(outcome.action, (counts.get(outcome.action) ?? 0) + 1);
    }
    return [...counts.entries()].map(([action, count]) => `${count} ${action}`).join(', ') || 'no resources';
  }

  private result(
    phase: Phase,
    state: ExecutionState,
    resources: ResourceOutcome[],
    gate: GateResult | undefined,
    warnings: string[],
    errors: DeploymentError[],
    startTime: number
  ): PhaseResult {
    return {
      phase: phase.name,
      status: state.status,
      resources,
      gate,
      warnings,
      errors,
      durationMs: Date.now() - startTime
    };
  }
}
