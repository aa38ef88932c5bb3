import { ResourceNamingService } from '../config/naming';
import { CancelledError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PlatformClient } from '../provisioning/types';
import { Phase, PlatformSettings } from '../types';
import { DependencyGraph } from './dependency-graph';
import { PhaseExecutor } from './phase-executor';
import { sleep } from './sleep';
import { structuralDiff } from './structural-diff';
import { ReconcileReport } from './types';

/**
 * Background loop that reapplies drifted or missing resources. Passes walk
 * phases in execution order and never overlap; failures are logged and
 * reported, never thrown.
 */
export class ConvergenceReconciler {
  private inFlight?: Promise<ReconcileReport>;

  constructor(
    private readonly graph: DependencyGraph<Phase>,
    private readonly settings: PlatformSettings,
    private readonly platform: PlatformClient,
    private readonly executor: PhaseExecutor,
    private readonly naming: ResourceNamingService,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Run one pass. A call made while a pass is running joins that pass.
   */
  reconcile(signal?: AbortSignal): Promise<ReconcileReport> {
    if (!this.inFlight) {
      this.inFlight = this.pass(signal).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /**
   * Reconcile every interval until the signal aborts
   */
  async run(signal: AbortSignal, onPass?: (report: ReconcileReport) => void): Promise<void> {
    const log = this.logger.child('reconciler');
    log.info(`Reconciling every ${Math.round(this.settings.reconcileIntervalMs / 1000)}s`);

    while (!signal.aborted) {
      try {
        const report = await this.reconcile(signal);
        onPass?.(report);
        await sleep(this.settings.reconcileIntervalMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          break;
        }
        throw error;
      }
    }
    log.info('Reconciler stopped');
  }

  private async pass(signal?: AbortSignal): Promise<ReconcileReport> {
    const startTime = Date.now();
    const log = this.logger.child('reconciler');
    const report: ReconcileReport = { checked: 0, reapplied: [], failed: [], durationMs: 0 };

    for (const phase of this.graph.order) {
      for (const descriptor of phase.resources) {
        if (signal?.aborted) {
          throw new CancelledError('Reconciliation cancelled');
        }

        const ref = this.naming.refOf(descriptor.payload);
        const identity = this.naming.identityOf(ref);
        report.checked++;

        try {
          const live = await this.platform.get(ref);
          const drift = live ? structuralDiff(descriptor.payload, live) : [];
          if (live && drift.length === 0) {
            continue;
          }

          log.warn(live ? `${identity} drifted at ${drift.join(', ')}` : `${identity} is missing`);
          const applied = await this.executor.applyResource(
            descriptor,
            { phase: phase.name, retryPolicy: phase.retryPolicy, timeoutMs: phase.timeoutMs },
            {
              pollIntervalMs: this.settings.pollIntervalMs,
              conflictGraceMs: this.settings.conflictGraceMs,
              signal
            }
          );

          if (applied.outcome.action === 'failed') {
            report.failed.push({ identity, phase: phase.name, error: applied.outcome.error ?? 'unknown error' });
          } else {
            report.reapplied.push(identity);
          }
        } catch (error) {
          if (error instanceof CancelledError) {
            throw error;
          }
          const message = errorMessage(error);
          report.failed.push({ identity, phase: phase.name, error: message });
          log.error(`${identity}: ${message}`);
        }
      }
    }

    report.durationMs = Date.now() - startTime;
    if (report.reapplied.length > 0 || report.failed.length > 0) {
      log.info(`Pass complete: ${report.reapplied.length} reapplied, ${report.failed.length} failed of ${report.checked}`);
    } else {
      log.debug(`Pass complete: ${report.checked} resource(s) in sync`);
    }
    return report;
  }
}
