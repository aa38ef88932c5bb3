import { CancelledError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PlatformClient } from '../provisioning/types';
import { CheckOutcome, GateResult, KubernetesManifest, ReadinessCheck } from '../types';
import { ConditionResult, describeTarget, evaluateTargets } from './readiness-conditions';
import { sleep } from './sleep';

export const DEFAULT_POLL_INTERVAL_MS = 5000;

export interface GateOptions {
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

interface PendingCheck {
  check: ReadinessCheck;
  target: string;
  deadline: number;
  lastReason: string;
}

/**
 * Polls the platform until readiness checks are satisfied. Every check has
 * its own deadline, capped by the overall timeout handed to waitFor.
 */
export class ReadinessGate {
  constructor(
    private readonly platform: PlatformClient,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Wait for the checks. Each check is polled until it is Ready or its own
   * deadline passes; an optional check that times out only produces a
   * warning. The first required timeout closes the gate and the checks still
   * pending are recorded as Skipped.
   *
   * @throws CancelledError when the signal aborts
   */
  async waitFor(checks: ReadinessCheck[], timeoutMs: number, options: GateOptions = {}): Promise<GateResult> {
    if (checks.length === 0) {
      return { outcome: 'Skipped', checks: [] };
    }

    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const start = Date.now();
    const outcomes = new Map<ReadinessCheck, CheckOutcome>();
    let pending: PendingCheck[] = checks.map(check => ({
      check,
      target: describeTarget(check),
      deadline: start + Math.min(check.timeoutMs, timeoutMs),
      lastReason: 'not evaluated'
    }));

    for (;;) {
      if (options.signal?.aborted) {
        throw new CancelledError('Readiness wait cancelled');
      }

      const results = await Promise.all(pending.map(entry => this.evaluate(entry.check)));
      const now = Date.now();
      const stillPending: PendingCheck[] = [];

      pending.forEach((entry, index) => {
        const result = results[index];
        entry.lastReason = result.reason;
        if (result.ready) {
          this.logger.debug(`${entry.target} ready (${result.reason})`);
          outcomes.set(entry.check, { check: entry.check, target: entry.target, state: 'Ready', reason: result.reason });
        } else if (now >= entry.deadline) {
          const message = `${entry.target} not ready after ${Math.round((entry.deadline - start) / 1000)}s: ${result.reason}`;
          if (entry.check.required) {
            this.logger.error(message);
          } else {
            this.logger.warn(`${message} (optional, continuing)`);
          }
          outcomes.set(entry.check, { check: entry.check, target: entry.target, state: 'TimedOut', reason: result.reason });
        } else {
          stillPending.push(entry);
        }
      });
      pending = stillPending;

      const requiredFailed = checks.some(check => check.required && outcomes.get(check)?.state === 'TimedOut');

      if (pending.length === 0 || requiredFailed) {
        for (const entry of pending) {
          outcomes.set(entry.check, {
            check: entry.check,
            target: entry.target,
            state: 'Skipped',
            reason: `abandoned after a required check failed: ${entry.lastReason}`
          });
        }
        break;
      }

      this.logger.debug(`waiting on ${pending.map(entry => entry.target).join(', ')}`);
      const nextDeadline = Math.min(...pending.map(entry => entry.deadline));
      await sleep(Math.max(0, Math.min(pollIntervalMs, nextDeadline - Date.now())), options.signal);
    }

    const ordered = checks.map(check => outcomes.get(check)).filter((outcome): outcome is CheckOutcome => !!outcome);
    const failed = ordered.some(outcome => outcome.check.required && outcome.state !== 'Ready');
    return { outcome: failed ? 'TimedOut' : 'Ready', checks: ordered };
  }

  /**
   * Evaluate a single check once, without waiting. Platform errors count
   * as not ready so a flaky read does not fail the wait early.
   */
  async evaluate(check: ReadinessCheck): Promise<ConditionResult> {
    try {
      return evaluateTargets(check, await this.resolveTargets(check));
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      return { ready: false, reason: `lookup failed: ${errorMessage(error)}` };
    }
  }

  private async resolveTargets(check: ReadinessCheck): Promise<KubernetesManifest[]> {
    if (check.selector.name) {
      const object = await this.platform.get({
        apiVersion: check.apiVersion,
        kind: check.targetKind,
        name: check.selector.name,
        namespace: check.namespace
      });
      return object ? [object] : [];
    }

    return this.platform.list(check.apiVersion, check.targetKind, {
      namespace: check.namespace,
      labelSelector: check.selector.labels
    });
  }
}
