import { z } from 'zod';
import { failure, success, type StageOutcome } from '../pipeline/outcome.js';

export const graphKindEnum = z.enum(['directed', 'undirected']);
export const searchStrategyEnum = z.enum(['greedy', 'mcts']);
export const samplingMethodEnum = z.enum(['tree', 'radial']);
export const outputFormatEnum = z.enum(['representative', 'instance']);

export type GraphKind = z.infer<typeof graphKindEnum>;

const size = z.number().int().positive();

/**
 * Miner configuration as accepted from callers.
 *
 * `graphKind` has no default: when absent it is
 * read from the primary artifact's job metadata just before mining.
 */
export const miningConfigSchema = z
  .object({
    minPatternSize: size.default(5),
    maxPatternSize: size.default(10),
    minNeighborhoodSize: size.default(5),
    maxNeighborhoodSize: size.default(10),
    neighborhoodCount: size.default(2000),
    trialCount: size.default(100),
    graphKind: graphKindEnum.optional(),
    searchStrategy: searchStrategyEnum.default('greedy'),
    samplingMethod: samplingMethodEnum.default('tree'),
    outputFormat: outputFormatEnum.default('representative'),
  })
  .strict()
  .refine((cfg) => cfg.minPatternSize <= cfg.maxPatternSize, {
    message: 'minPatternSize must not exceed maxPatternSize',
    path: ['minPatternSize'],
  })
  .refine((cfg) => cfg.minNeighborhoodSize <= cfg.maxNeighborhoodSize, {
    message: 'minNeighborhoodSize must not exceed maxNeighborhoodSize',
    path: ['minNeighborhoodSize'],
  });

export type MiningConfigInput = z.input<typeof miningConfigSchema>;
export type MiningConfig = z.infer<typeof miningConfigSchema>;

/** A mining config whose graph kind has been settled. */
export type ResolvedMiningConfig = MiningConfig & { graphKind: GraphKind };

/**
 * Validate caller-supplied mining options. Runs before any network call, so
 * an inverted bound never reaches the miner.
 */
export const parseMiningConfig = (input: unknown): StageOutcome<MiningConfig> => {
  const parsed = miningConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'miningConfig'}: ${issue.message}`)
      .join('; ');
    return failure('ValidationError', `Invalid mining configuration: ${issues}`, { stage: 'validation' });
  }
  return success(parsed.data);
};

/** Wire form expected by the miner's `config` part. */
export const toMinerPayload = (cfg: ResolvedMiningConfig) => ({
  min_pattern_size: cfg.minPatternSize,
  max_pattern_size: cfg.maxPatternSize,
  min_neighborhood_size: cfg.minNeighborhoodSize,
  max_neighborhood_size: cfg.maxNeighborhoodSize,
  n_neighborhoods: cfg.neighborhoodCount,
  n_trials: cfg.trialCount,
  graph_type: cfg.graphKind,
  search_strategy: cfg.searchStrategy,
  sample_method: cfg.samplingMethod,
  out_batch_format: cfg.outputFormat,
});
