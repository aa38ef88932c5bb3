import { CancelledError, PlatformError, PlatformErrorKind, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { ExecutionState, RetryPolicy } from '../types';
import { sleep } from './sleep';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000
};

export interface RetryOptions {
  policy: RetryPolicy;
  /** Used in log lines, e.g. "create Deployment/kyuubi/minio" */
  label: string;
  signal?: AbortSignal;
  /** Highest attempt number and the last error are recorded here */
  state?: ExecutionState;
}

/**
 * Wraps platform calls with a bounded exponential backoff. Only transient
 * failures are retried; conflicts and fatal errors are returned to the
 * caller on the first occurrence.
 */
export class RetryController {
  constructor(private readonly logger: Logger = silentLogger) {}

  classify(error: unknown): PlatformErrorKind {
    if (error instanceof PlatformError) {
      return error.kind;
    }
    return 'fatal';
  }

  /**
   * Delay before the given retry (attempt 1 is the first retry)
   */
  backoffDelay(policy: RetryPolicy, attempt: number): number {
    const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, Math.max(0, attempt - 1));
    return Math.min(delay, policy.maxDelayMs);
  }

  async run<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const maxAttempts = Math.max(1, options.policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) {
        throw new CancelledError(`${options.label} cancelled`);
      }
      if (options.state) {
        options.state.attempt = Math.max(options.state.attempt, attempt);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }

        const kind = this.classify(error);
        if (options.state) {
          options.state.lastError = errorMessage(error);
        }

        if (kind !== 'transient' || attempt >= maxAttempts) {
          if (kind === 'transient') {
            this.logger.error(`${options.label}: giving up after ${attempt} attempt(s): ${errorMessage(error)}`);
          }
          throw error;
        }

        const delay = this.backoffDelay(options.policy, attempt);
        this.logger.warn(
          `${options.label}: transient failure on attempt ${attempt}/${maxAttempts}, retrying in ${delay}ms: ${errorMessage(error)}`
        );
        await sleep(delay, options.signal);
      }
    }
  }
}
