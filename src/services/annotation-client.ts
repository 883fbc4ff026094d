/**
 * Client for the annotation service. The annotation payload is opaque to
 * this service and is handed back to the caller untouched.
 */

import { z } from 'zod';
import { logger, type Logger } from '../logger.js';
import type { StageOutcome } from '../pipeline/outcome.js';
import type { Annotator, Motif } from '../pipeline/types.js';
import { requestJson } from './http.js';

const SERVICE = 'annotation service';

export interface AnnotationClientOptions {
  /** Full endpoint URL. */
  url: string;
}

export class AnnotationClient implements Annotator {
  constructor(private readonly options: AnnotationClientOptions) {}

  /**
   * @param correlationId - graph-database job id the motif is looked up against
   */
  async annotate(
    correlationId: string,
    motif: Motif,
    timeoutMs: number,
    log: Logger = logger,
  ): Promise<StageOutcome<unknown>> {
    log.info({ correlationId }, 'Requesting motif annotation');

    return requestJson(
      this.options.url,
      {
        service: SERVICE,
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ correlation_id: correlationId, type: 'cypher', motif }),
        timeoutMs,
        log,
      },
      z.unknown(),
    );
  }
}
