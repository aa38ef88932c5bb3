import { ResourceNamingService } from '../config/naming';
import { CancelledError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PlatformClient } from '../provisioning/types';
import { Phase } from '../types';
import { DependencyGraph } from './dependency-graph';
import { RetryController } from './retry-controller';
import { TeardownResult } from './types';

export interface TeardownOptions {
  /** Grace period handed to the platform with every delete */
  deleteGraceMs: number;
  signal?: AbortSignal;
}

/**
 * Removes resources phase by phase in reverse dependency order. Deletes are
 * not awaited to completion, an absent object counts as deleted, and a
 * failing resource never stops the rest of the teardown.
 */
export class TeardownController {
  constructor(
    private readonly platform: PlatformClient,
    private readonly retry: RetryController,
    private readonly naming: ResourceNamingService,
    private readonly logger: Logger = silentLogger
  ) {}

  async teardown(graph: DependencyGraph<Phase>, options: TeardownOptions): Promise<TeardownResult> {
    const phases = graph.reverseOrder();
    const result: TeardownResult = { order: phases.map(phase => phase.name), deleted: [], absent: [], failed: [] };
    const gracePeriodSeconds = Math.ceil(options.deleteGraceMs / 1000);

    for (const phase of phases) {
      const log = this.logger.child(phase.name);
      log.info(`Removing ${phase.resources.length} resource(s)`);

      for (const descriptor of [...phase.resources].reverse()) {
        if (options.signal?.aborted) {
          throw new CancelledError('Teardown cancelled');
        }

        const ref = this.naming.refOf(descriptor.payload);
        const identity = this.naming.identityOf(ref);
        try {
          const existed = await this.retry.run(() => this.platform.delete(ref, { gracePeriodSeconds }), {
            policy: phase.retryPolicy,
            label: `delete ${identity}`,
            signal: options.signal
          });
          if (existed) {
            result.deleted.push(identity);
            log.debug(`${identity} deleted`);
          } else {
            result.absent.push(identity);
            log.debug(`${identity} already absent`);
          }
        } catch (error) {
          if (error instanceof CancelledError) {
            throw error;
          }
          const message = errorMessage(error);
          result.failed.push({ identity, phase: phase.name, error: message });
          log.warn(`${identity} could not be deleted: ${message}`);
        }
      }
    }

    return result;
  }
}
