import type { RunError, StageError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { GraphKind, ResolvedMiningConfig } from '../jobs/mining-config.js';
import type { StageOutcome } from './outcome.js';

/** Builder output writer. `networkx` feeds the miner, `neo4j` feeds annotation. */
export type WriterType = 'networkx' | 'neo4j';

/** A tabular input file as received from the caller. */
export interface TabularInput {
  fileName: string;
  content: Buffer;
}

/** A tabular input staged into the run's temporary workspace. */
export interface StagedFile {
  fileName: string;
  path: string;
}

export interface GraphLoadRequest {
  files: StagedFile[];
  /** Builder config document (JSON text, passed through untouched). */
  config: string;
  /** Builder schema document (JSON text, passed through untouched). */
  schema: string;
  writerType: WriterType;
  tenantId: string;
  sessionId: string;
}

export interface GraphLoadResult {
  jobId: string;
  /** Location of the generated artifact on the shared volume, when the writer produces a file. */
  artifactPath?: string;
}

export interface BuilderJobStatus {
  jobId: string;
  status: string;
  graphKind?: GraphKind;
}

export interface MiningResult {
  motifs: unknown[];
  statistics: Record<string, unknown>;
}

export type Motif = Record<string, unknown>;

/** Adapters log through `log` when given one, so their lines carry the caller's run context. */
export interface GraphBuilder {
  load(request: GraphLoadRequest, timeoutMs: number, log?: Logger): Promise<StageOutcome<GraphLoadResult>>;
  getJob(jobId: string, timeoutMs: number, log?: Logger): Promise<StageOutcome<BuilderJobStatus>>;
}

export interface MotifMiner {
  mine(
    artifactPath: string,
    config: ResolvedMiningConfig,
    timeoutMs: number,
    log?: Logger,
  ): Promise<StageOutcome<MiningResult>>;
}

export interface Annotator {
  annotate(correlationId: string, motif: Motif, timeoutMs: number, log?: Logger): Promise<StageOutcome<unknown>>;
}

export interface ReadinessCheck {
  isReady(jobId: string): Promise<boolean>;
}

export interface RunPipelineInput {
  files: TabularInput[];
  config: string;
  schema: string;
  tenantId?: string;
  sessionId?: string;
  /** Raw mining options; validated against the mining config schema before any network call. */
  mining?: unknown;
}

export type PipelineStatus = 'success' | 'partial_failure' | 'total_failure';

export interface PipelineRun {
  runId: string;
  tenantId: string;
  sessionId: string;
  status: PipelineStatus;
  stage1JobId?: string;
  stage2JobId?: string;
  primaryArtifactLocation?: string;
  motifs: unknown[];
  statistics: Record<string, unknown> | null;
  stage2Ready: boolean;
  error: RunError | null;
  startedAt: string;
  finishedAt: string;
}

export interface AnnotateInput {
  runId: string;
  stage2JobId: string;
  motif: Motif;
}

export type AnnotationStatus = 'annotated' | 'failed';

export interface AnnotationResult {
  runId: string;
  stage2JobId: string;
  status: AnnotationStatus;
  annotation?: unknown;
  error: StageError | null;
}
