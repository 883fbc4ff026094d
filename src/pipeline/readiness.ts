import { logger } from '../logger.js';
import type { GraphBuilder, ReadinessCheck } from './types.js';

const COMPLETED = 'completed';

/**
 * Single-shot readiness check against the builder's job endpoint.
 *
 * Any failure to get a definite "completed" answer reads as not ready, so a
 * job that is still running and one that will never finish look the same.
 * Callers that need to wait must call again.
 */
export class ReadinessProber implements ReadinessCheck {
  constructor(
    private readonly builder: GraphBuilder,
    private readonly timeoutMs: number,
  ) {}

  async isReady(jobId: string): Promise<boolean> {
    const outcome = await this.builder.getJob(jobId, this.timeoutMs);
    if (!outcome.ok) {
      logger.debug({ jobId, error: outcome.error }, 'Readiness probe failed');
      return false;
    }

    const ready = outcome.value.status === COMPLETED;
    logger.debug({ jobId, status: outcome.value.status, ready }, 'Readiness probe answered');
    return ready;
  }
}
