/**
 * Pipeline coordinator.
 *
 * runPipeline:
 *   primary graph (builder, networkx) ──► ┬─ secondary graph (builder, neo4j)
 *                                         └─ mining (miner on the primary artifact)
 *   then merges both branch outcomes into one PipelineRun.
 *
 * annotate:
 *   readiness probe on the secondary job ──► annotation service
 *
 * Every entry point resolves to a structured result. Downstream faults come
 * back from the clients as failed outcomes; local faults are caught here.
 */

import { randomUUID } from 'crypto';
import { describeStageError, type RunError, type StageError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import { parseMiningConfig, type MiningConfig } from '../jobs/mining-config.js';
import { stageFiles, withTempDir } from '../infra/temp.js';
import { settleBoth } from './aggregator.js';
import { failure, withStage, type StageOutcome } from './outcome.js';
import type { RunRegistry } from './run-registry.js';
import type {
  AnnotateInput,
  AnnotationResult,
  Annotator,
  GraphBuilder,
  GraphLoadResult,
  MiningResult,
  MotifMiner,
  PipelineRun,
  ReadinessCheck,
  RunPipelineInput,
  StagedFile,
} from './types.js';

export interface CoordinatorTimeouts {
  builderTimeoutMs: number;
  minerTimeoutMs: number;
  annotationTimeoutMs: number;
  /** Used for the artifact metadata lookup that settles the graph kind. */
  metadataTimeoutMs: number;
}

export interface PipelineCoordinatorDeps {
  builder: GraphBuilder;
  miner: MotifMiner;
  annotator: Annotator;
  readiness: ReadinessCheck;
  timeouts: CoordinatorTimeouts;
  /** Root under which each run gets its own temporary workspace. */
  tmpDir: string;
  registry?: RunRegistry;
  generateId?: () => string;
}

interface RunContext {
  runId: string;
  tenantId: string;
  sessionId: string;
  startedAt: string;
  log: Logger;
}

type RunFields = Omit<PipelineRun, 'runId' | 'tenantId' | 'sessionId' | 'startedAt' | 'finishedAt'>;

const DEFAULT_TENANT = 'default';

const emptyPayload = {
  motifs: [],
  statistics: null,
  stage2Ready: false,
} satisfies Partial<RunFields>;

export class PipelineCoordinator {
  private readonly generateId: () => string;

  constructor(private readonly deps: PipelineCoordinatorDeps) {
    this.generateId = deps.generateId ?? randomUUID;
  }

  async runPipeline(input: RunPipelineInput): Promise<PipelineRun> {
    const runId = this.generateId();
    const tenantId = input.tenantId || DEFAULT_TENANT;
    const sessionId = input.sessionId || this.generateId();
    const ctx: RunContext = {
      runId,
      tenantId,
      sessionId,
      startedAt: new Date().toISOString(),
      log: logger.child({ runId, tenantId, sessionId }),
    };

    const mining = parseMiningConfig(input.mining);
    if (!mining.ok) {
      ctx.log.warn({ error: mining.error }, 'Rejected pipeline request');
      return this.finish(ctx, { ...emptyPayload, status: 'total_failure', error: mining.error });
    }
    if (input.files.length === 0) {
      return this.finish(ctx, {
        ...emptyPayload,
        status: 'total_failure',
        error: { kind: 'ValidationError', message: 'At least one tabular file is required', stage: 'validation' },
      });
    }

    ctx.log.info({ files: input.files.map((f) => f.fileName) }, 'Pipeline run started');

    let fields: RunFields;
    try {
      fields = await withTempDir(this.deps.tmpDir, `run-${runId}`, async (dir) => {
        const files = await stageFiles(dir, input.files);
        return this.execute(ctx, input, files, mining.value);
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      ctx.log.error({ err }, 'Pipeline run failed inside the service');
      fields = {
        ...emptyPayload,
        status: 'total_failure',
        error: { kind: 'Internal', message: `Pipeline run aborted: ${message}` },
      };
    }

    return this.finish(ctx, fields);
  }

  async annotate(input: AnnotateInput): Promise<AnnotationResult> {
    const { runId, stage2JobId, motif } = input;
    const log = logger.child({ runId, stage2JobId });

    const ready = await this.deps.readiness.isReady(stage2JobId);
    if (!ready) {
      log.info('Graph database job not ready, skipping annotation');
      return {
        runId,
        stage2JobId,
        status: 'failed',
        error: {
          kind: 'NotReady',
          message: `Graph database job ${stage2JobId} is not ready for annotation`,
          stage: 'readiness',
        },
      };
    }

    const outcome = withStage(
      await this.deps.annotator.annotate(stage2JobId, motif, this.deps.timeouts.annotationTimeoutMs, log),
      'annotation',
    );
    if (!outcome.ok) {
      log.warn({ error: outcome.error }, 'Annotation failed');
      return { runId, stage2JobId, status: 'failed', error: outcome.error };
    }

    log.info('Annotation completed');
    return { runId, stage2JobId, status: 'annotated', annotation: outcome.value, error: null };
  }

  /** Single readiness probe, exposed so callers can poll between annotate attempts. */
  checkReadiness(jobId: string): Promise<boolean> {
    return this.deps.readiness.isReady(jobId);
  }

  private async execute(
    ctx: RunContext,
    input: RunPipelineInput,
    files: StagedFile[],
    mining: MiningConfig,
  ): Promise<RunFields> {
    const { builder, timeouts } = this.deps;
    const loadRequest = {
      files,
      config: input.config,
      schema: input.schema,
      tenantId: ctx.tenantId,
      sessionId: ctx.sessionId,
    };

    const primary = withStage(
      await builder.load({ ...loadRequest, writerType: 'networkx' }, timeouts.builderTimeoutMs, ctx.log),
      'primary_graph',
    );
    if (!primary.ok) {
      ctx.log.error({ error: primary.error }, 'Primary graph generation failed');
      return { ...emptyPayload, status: 'total_failure', error: primary.error };
    }

    const { jobId: stage1JobId, artifactPath } = primary.value;
    if (!artifactPath) {
      return {
        ...emptyPayload,
        status: 'total_failure',
        stage1JobId,
        error: {
          kind: 'InvalidResponse',
          message: `No primary artifact location for builder job ${stage1JobId}`,
          stage: 'primary_graph',
        },
      };
    }

    ctx.log.info({ stage1JobId, artifactPath }, 'Primary graph ready, starting parallel branches');

    const [secondary, mined] = await settleBoth<GraphLoadResult, MiningResult>(
      {
        name: 'secondary_graph',
        run: () => builder.load({ ...loadRequest, writerType: 'neo4j' }, timeouts.builderTimeoutMs, ctx.log),
      },
      {
        name: 'mining',
        run: () => this.mine(ctx, stage1JobId, artifactPath, mining),
      },
    );

    return this.merge(ctx, { stage1JobId, primaryArtifactLocation: artifactPath }, secondary, mined);
  }

  private async mine(
    ctx: RunContext,
    stage1JobId: string,
    artifactPath: string,
    mining: MiningConfig,
  ): Promise<StageOutcome<MiningResult>> {
    const { builder, miner, timeouts } = this.deps;

    let graphKind = mining.graphKind;
    if (!graphKind) {
      const job = await builder.getJob(stage1JobId, timeouts.metadataTimeoutMs, ctx.log);
      if (!job.ok) {
        return job;
      }
      if (!job.value.graphKind) {
        return failure('InvalidResponse', `Builder job ${stage1JobId} does not report a graph kind`);
      }
      graphKind = job.value.graphKind;
      ctx.log.debug({ stage1JobId, graphKind }, 'Resolved graph kind from artifact metadata');
    }

    return miner.mine(artifactPath, { ...mining, graphKind }, timeouts.minerTimeoutMs, ctx.log);
  }

  private merge(
    ctx: RunContext,
    primary: { stage1JobId: string; primaryArtifactLocation: string },
    secondary: StageOutcome<GraphLoadResult>,
    mined: StageOutcome<MiningResult>,
  ): RunFields {
    const stage2 = {
      stage2JobId: secondary.ok ? secondary.value.jobId : undefined,
      stage2Ready: secondary.ok,
    };
    const payload = mined.ok
      ? { motifs: mined.value.motifs, statistics: mined.value.statistics }
      : { motifs: [], statistics: null };

    const errors: StageError[] = [];
    if (!secondary.ok) errors.push(secondary.error);
    if (!mined.ok) errors.push(mined.error);

    if (errors.length === 0) {
      ctx.log.info({ stage2JobId: stage2.stage2JobId, motifCount: payload.motifs.length }, 'Pipeline run succeeded');
      return { ...primary, ...stage2, ...payload, status: 'success', error: null };
    }

    if (errors.length === 1) {
      ctx.log.warn({ error: errors[0] }, 'Pipeline run partially failed');
      return { ...primary, ...stage2, ...payload, status: 'partial_failure', error: errors[0] };
    }

    const aggregate: RunError = {
      kind: errors[0].kind,
      message: `All parallel branches failed: ${errors.map(describeStageError).join('; ')}`,
      causes: errors,
    };
    ctx.log.error({ error: aggregate }, 'Pipeline run failed in every branch');
    return { ...primary, ...stage2, ...payload, status: 'total_failure', error: aggregate };
  }

  private finish(ctx: RunContext, fields: RunFields): PipelineRun {
    const run: PipelineRun = {
      runId: ctx.runId,
      tenantId: ctx.tenantId,
      sessionId: ctx.sessionId,
      ...fields,
      startedAt: ctx.startedAt,
      finishedAt: new Date().toISOString(),
    };
    this.deps.registry?.record(run);
    return run;
  }
}
