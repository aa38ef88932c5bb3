import { v4 as uuidv4 } from 'uuid';
import { ResourceNamingService, createNamingService } from '../config/naming';
import { CancelledError, PreflightError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PlatformClient, SecretsEngineClient } from '../provisioning/types';
import {
  CheckOutcome,
  DeploymentError,
  DeploymentMetadata,
  DeploymentResult,
  ExecutionState,
  Phase,
  PhaseResult,
  PlatformPlan
} from '../types';
import { ConvergenceReconciler } from './convergence-reconciler';
import { DependencyGraph } from './dependency-graph';
import { ExecutorOptions, PhaseExecutor } from './phase-executor';
import { describeTarget } from './readiness-conditions';
import { ReadinessGate } from './readiness-gate';
import { RetryController } from './retry-controller';
import { SecretsBootstrapCoordinator, setupFailureMessage } from './secrets-bootstrap';
import { structuralDiff } from './structural-diff';
import { TeardownController } from './teardown-controller';
import { DeployOptions, PhaseStatusReport, StatusReport, TeardownResult } from './types';

export interface OrchestratorDependencies {
  platform: PlatformClient;
  /** Required when the plan has a secrets bootstrap phase */
  secrets?: SecretsEngineClient;
  logger?: Logger;
  naming?: ResourceNamingService;
}

/**
 * Single control loop over the phase graph. Phases run strictly in
 * dependency order; a Fatal phase skips its transitive dependents while
 * independent phases continue, and a secrets phase that failed or was
 * skipped skips everything that has not yet run.
 */
export class DeploymentOrchestrator {
  private readonly platform: PlatformClient;
  private readonly secrets?: SecretsEngineClient;
  private readonly logger: Logger;
  private readonly naming: ResourceNamingService;
  private readonly retry: RetryController;
  private readonly gate: ReadinessGate;
  private readonly executor: PhaseExecutor;

  constructor(dependencies: OrchestratorDependencies) {
    this.platform = dependencies.platform;
    this.secrets = dependencies.secrets;
    this.logger = dependencies.logger ?? silentLogger;
    this.naming = dependencies.naming ?? createNamingService();
    this.retry = new RetryController(this.logger.child('retry'));
    this.gate = new ReadinessGate(this.platform, this.logger.child('readiness'));
    this.executor = new PhaseExecutor(this.platform, this.gate, this.retry, this.naming, this.logger);
  }

  /**
   * Validate the phase graph and return it. Nothing touches the platform.
   *
   * @throws ConfigurationError for dangling dependencies or duplicate names
   * @throws CycleDetectedError when the graph has a cycle
   */
  plan(plan: PlatformPlan): DependencyGraph<Phase> {
    return DependencyGraph.build(plan.phases);
  }

  async deploy(plan: PlatformPlan, options: DeployOptions = {}): Promise<DeploymentResult> {
    const graph = this.plan(plan);
    if (!this.secrets && plan.phases.some(phase => phase.secrets)) {
      throw new PreflightError([{ location: 'secrets', message: 'a secrets engine client is required for the secrets phase' }]);
    }

    const startTime = Date.now();
    const metadata: DeploymentMetadata = {
      runId: uuidv4(),
      platform: plan.platform.name,
      startedAt: new Date(startTime)
    };
    const order = graph.order.map(phase => phase.name);
    this.logger.info(`Run ${metadata.runId}: ${order.join(' -> ')}`);

    const states = new Map<string, ExecutionState>(
      graph.order.map(phase => [phase.name, { phaseName: phase.name, status: 'Pending', attempt: 0 }])
    );
    const phases: PhaseResult[] = [];
    const errors: DeploymentError[] = [];
    const executorOptions: ExecutorOptions = {
      concurrency: plan.platform.concurrency,
      pollIntervalMs: plan.platform.pollIntervalMs,
      conflictGraceMs: plan.platform.conflictGraceMs,
      signal: options.signal
    };
    let halted: string | undefined;

    for (const phase of graph.order) {
      const state = states.get(phase.name);
      if (!state) {
        continue;
      }
      if (state.status === 'Skipped') {
        if (phase.secrets && !halted) {
          halted = `secrets phase ${phase.name} was skipped`;
        }
        continue;
      }
      if (!halted && options.signal?.aborted) {
        halted = 'deployment cancelled';
      }
      if (halted) {
        this.skip(state, halted);
        continue;
      }

      const blocker = phase.dependsOn.find(dependency => !this.canProceed(graph.get(dependency), states.get(dependency)));
      if (blocker) {
        this.skip(state, `dependency ${blocker} did not succeed`);
        if (phase.secrets) {
          halted = `secrets phase ${phase.name} was skipped`;
        }
        continue;
      }

      const result = await this.runPhase(phase, state, executorOptions);
      if (!result) {
        halted = 'deployment cancelled';
        errors.push({ code: 'CANCELLED', message: `Deployment cancelled during phase ${phase.name}`, phase: phase.name });
        continue;
      }
      phases.push(result);
      errors.push(...result.errors);

      if (state.status === 'Fatal') {
        if (phase.secrets) {
          halted = `secrets phase ${phase.name} failed`;
        }
        for (const dependent of graph.transitiveDependents(phase.name)) {
          const dependentState = states.get(dependent.name);
          if (dependentState) {
            this.skip(dependentState, `dependency ${phase.name} failed`);
          }
        }
      }
    }

    const finalStates = order.flatMap(name => states.get(name) ?? []);
    const cancelled = options.signal?.aborted === true || errors.some(error => error.code === 'CANCELLED');
    const failed = cancelled || finalStates.some(state => state.status === 'Fatal');
    metadata.duration = Date.now() - startTime;

    return {
      success: !failed,
      exitCode: failed ? 1 : 0,
      order,
      states: finalStates,
      phases,
      errors,
      metadata
    };
  }

  /**
   * Recompute every phase's state from the live platform. Nothing from a
   * previous run is consulted.
   */
  async inspect(plan: PlatformPlan): Promise<StatusReport> {
    const graph = this.plan(plan);
    const statuses = new Map<string, ExecutionState>();
    const phases: PhaseStatusReport[] = [];

    for (const phase of graph.order) {
      const report = await this.inspectPhase(phase, statuses);
      statuses.set(phase.name, report.state);
      phases.push(report);
    }

    return {
      platform: plan.platform.name,
      order: graph.order.map(phase => phase.name),
      phases,
      exitCode: phases.some(report => report.state.status === 'Fatal') ? 1 : 0
    };
  }

  async cleanup(plan: PlatformPlan, options: DeployOptions = {}): Promise<TeardownResult> {
    const teardown = new TeardownController(this.platform, this.retry, this.naming, this.logger);
    return teardown.teardown(this.plan(plan), {
      deleteGraceMs: plan.platform.deleteGraceMs,
      signal: options.signal
    });
  }

  createReconciler(plan: PlatformPlan): ConvergenceReconciler {
    return new ConvergenceReconciler(this.plan(plan), plan.platform, this.platform, this.executor, this.naming, this.logger);
  }

  /**
   * Resolves undefined when the signal aborted mid-phase
   */
  private async runPhase(phase: Phase, state: ExecutionState, options: ExecutorOptions): Promise<PhaseResult | undefined> {
    const startTime = Date.now();
    try {
      if (phase.secrets && this.secrets) {
        return await this.coordinator(this.secrets).run(phase, state, options);
      }
      return await this.executor.execute(phase, state, options);
    } catch (error) {
      if (error instanceof CancelledError) {
        state.status = 'Failed';
        state.lastError = error.message;
        return undefined;
      }
      state.status = phase.optional ? 'Failed' : 'Fatal';
      state.lastError = errorMessage(error);
      this.logger.child(phase.name).error(state.lastError);
      return {
        phase: phase.name,
        status: state.status,
        resources: [],
        warnings: [],
        errors: [{ code: 'PHASE_FAILED', message: state.lastError, phase: phase.name }],
        durationMs: Date.now() - startTime
      };
    }
  }

  /**
   * Dependents may start once a dependency succeeded, or once an optional
   * dependency has finished either way
   */
  private canProceed(dependency: Phase | undefined, state: ExecutionState | undefined): boolean {
    if (!dependency || !state) {
      return false;
    }
    if (state.status === 'Succeeded') {
      return true;
    }
    return dependency.optional && (state.status === 'Failed' || state.status === 'Skipped');
  }

  private coordinator(engine: SecretsEngineClient): SecretsBootstrapCoordinator {
    return new SecretsBootstrapCoordinator(engine, this.executor, this.retry, this.naming, this.logger);
  }

  private skip(state: ExecutionState, reason: string): void {
    if (state.status !== 'Pending') {
      return;
    }
    state.status = 'Skipped';
    state.lastError = reason;
    this.logger.child(state.phaseName).warn(`Skipped: ${reason}`);
  }

  private async inspectPhase(phase: Phase, statuses: Map<string, ExecutionState>): Promise<PhaseStatusReport> {
    const state: ExecutionState = { phaseName: phase.name, status: 'Pending', attempt: 0 };
    const missing: string[] = [];
    const drifted: string[] = [];
    const warnings: string[] = [];

    for (const descriptor of phase.resources) {
      const ref = this.naming.refOf(descriptor.payload);
      const identity = this.naming.identityOf(ref);
      try {
        const live = await this.platform.get(ref);
        if (!live) {
          missing.push(identity);
        } else if (structuralDiff(descriptor.payload, live).length > 0) {
          drifted.push(identity);
        }
      } catch (error) {
        missing.push(identity);
        warnings.push(`lookup of ${identity} failed: ${errorMessage(error)}`);
      }
    }

    const present = phase.resources.length - missing.length;

    // Engine setup precedes every platform object of the secrets phase, so a
    // failure there leaves nothing on the platform to inspect
    if (phase.secrets && this.secrets) {
      const engine = await this.coordinator(this.secrets).inspect(phase.secrets);
      const reason = engine.failure ?? (present > 0 ? engine.missing : undefined);
      if (reason) {
        state.status = 'Fatal';
        state.lastError = setupFailureMessage(engine.state, reason);
        return { state, missing, drifted, checks: [], warnings };
      }
      if (engine.missing) {
        warnings.push(`secrets engine not set up: ${engine.missing}`);
      }
    }

    if (phase.resources.length > 0 && present === 0) {
      const blocker = phase.dependsOn.find(dependency => statuses.get(dependency)?.status !== 'Succeeded');
      if (blocker) {
        state.status = 'Skipped';
        state.lastError = `dependency ${blocker} is ${statuses.get(blocker)?.status ?? 'unknown'}`;
      }
      return { state, missing, drifted, checks: [], warnings };
    }

    if (missing.length > 0) {
      state.status = 'Failed';
      state.lastError = `missing resources: ${missing.join(', ')}`;
      return { state, missing, drifted, checks: [], warnings };
    }

    const checks: CheckOutcome[] = [];
    for (const check of phase.healthChecks) {
      const result = await this.gate.evaluate(check);
      checks.push({
        check,
        target: describeTarget(check),
        state: result.ready ? 'Ready' : 'TimedOut',
        reason: result.reason
      });
    }

    const unsatisfied = checks.filter(outcome => outcome.state !== 'Ready');
    const required = unsatisfied.filter(outcome => outcome.check.required);
    for (const outcome of unsatisfied.filter(item => !item.check.required)) {
      warnings.push(`optional check ${outcome.target} not ${outcome.check.condition}: ${outcome.reason ?? 'unknown'}`);
    }
    for (const identity of drifted) {
      warnings.push(`${identity} has drifted from its declaration`);
    }

    if (required.length > 0) {
      state.status = 'Fatal';
      state.lastError = required
        .map(outcome => `${outcome.target} not ${outcome.check.condition}: ${outcome.reason ?? 'unknown'}`)
        .join('; ');
    } else {
      state.status = 'Succeeded';
    }
    return { state, missing, drifted, checks, warnings };
  }
}
