/**
 * Client for the AtomSpace builder service.
 *
 * The builder turns tabular files into graph artifacts. Each `/api/load` call
 * produces one artifact for one writer; the NetworkX artifact is dropped on
 * the shared volume under `<sharedOutputPath>/<job_id>/`.
 */

import { readFile } from 'fs/promises';
import { posix } from 'path';
import { z } from 'zod';
import { logger, type Logger } from '../logger.js';
import { graphKindEnum } from '../jobs/mining-config.js';
import { failure, success, type StageOutcome } from '../pipeline/outcome.js';
import type {
  BuilderJobStatus,
  GraphBuilder,
  GraphLoadRequest,
  GraphLoadResult,
  WriterType,
} from '../pipeline/types.js';
import { requestJson } from './http.js';

const SERVICE = 'AtomSpace builder';

const ARTIFACT_FILE_NAMES: Partial<Record<WriterType, string>> = {
  networkx: 'networkx_graph.pkl',
};

const loadResponseSchema = z
  .object({
    job_id: z.string().min(1),
  })
  .passthrough();

const jobResponseSchema = z
  .object({
    status: z.string(),
    graph_type: z.string().optional(),
  })
  .passthrough();

export interface BuilderClientOptions {
  baseUrl: string;
  sharedOutputPath: string;
}

export class BuilderClient implements GraphBuilder {
  constructor(private readonly options: BuilderClientOptions) {}

  /** Where the builder writes the artifact for a job, or undefined for writers that don't produce a file. */
  artifactPath(jobId: string, writerType: WriterType): string | undefined {
    const fileName = ARTIFACT_FILE_NAMES[writerType];
    return fileName ? posix.join(this.options.sharedOutputPath, jobId, fileName) : undefined;
  }

  async load(
    request: GraphLoadRequest,
    timeoutMs: number,
    log: Logger = logger,
  ): Promise<StageOutcome<GraphLoadResult>> {
    const formData = new FormData();
    try {
      for (const file of request.files) {
        const bytes = await readFile(file.path);
        formData.append('files', new Blob([bytes], { type: 'text/csv' }), file.fileName);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ err, writerType: request.writerType }, 'Failed to read staged tabular input');
      return failure('Internal', `Could not read staged input for ${SERVICE}: ${message}`);
    }

    formData.append('config', request.config);
    formData.append('schema_json', request.schema);
    formData.append('writer_type', request.writerType);
    formData.append('tenant_id', request.tenantId);
    formData.append('session_id', request.sessionId);

    log.info(
      {
        writerType: request.writerType,
        files: request.files.map((f) => f.fileName),
        tenantId: request.tenantId,
        sessionId: request.sessionId,
      },
      'Requesting graph generation',
    );

    const outcome = await requestJson(
      `${this.options.baseUrl}/api/load`,
      { service: SERVICE, method: 'POST', body: formData, timeoutMs, log },
      loadResponseSchema,
    );
    if (!outcome.ok) {
      return outcome;
    }

    const jobId = outcome.value.job_id;
    log.info({ jobId, writerType: request.writerType }, 'Graph generation completed');
    return success({ jobId, artifactPath: this.artifactPath(jobId, request.writerType) });
  }

  async getJob(jobId: string, timeoutMs: number, log: Logger = logger): Promise<StageOutcome<BuilderJobStatus>> {
    const outcome = await requestJson(
      `${this.options.baseUrl}/api/job/${encodeURIComponent(jobId)}`,
      { service: SERVICE, method: 'GET', timeoutMs, log },
      jobResponseSchema,
    );
    if (!outcome.ok) {
      return outcome;
    }

    const { status, graph_type: graphType } = outcome.value;
    const graphKind = graphKindEnum.safeParse(graphType);
    return success({
      jobId,
      status,
      ...(graphKind.success && { graphKind: graphKind.data }),
    });
  }
}
