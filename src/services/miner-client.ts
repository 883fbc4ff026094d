/**
 * Client for the neural subgraph miner.
 *
 * Sends the primary NetworkX artifact and the mining parameters to `/mine`
 * and checks that the answer carries a `motifs` list and a `statistics`
 * object before reporting success.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import { logger, type Logger } from '../logger.js';
import { toMinerPayload, type ResolvedMiningConfig } from '../jobs/mining-config.js';
import { failure, success, type StageOutcome } from '../pipeline/outcome.js';
import type { MiningResult, MotifMiner } from '../pipeline/types.js';
import { requestJson } from './http.js';

const SERVICE = 'neural miner';

export const minerResponseSchema = z
  .object({
    motifs: z.array(z.unknown()),
    statistics: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export interface MinerClientOptions {
  baseUrl: string;
}

export class MinerClient implements MotifMiner {
  constructor(private readonly options: MinerClientOptions) {}

  async mine(
    artifactPath: string,
    config: ResolvedMiningConfig,
    timeoutMs: number,
    log: Logger = logger,
  ): Promise<StageOutcome<MiningResult>> {
    let artifact: Buffer;
    try {
      artifact = await readFile(artifactPath);
    } catch (err) {
      // written by the builder; a missing file is a downstream fault
      log.warn({ err, artifactPath }, 'Primary graph artifact is not readable');
      return failure('RemoteError', `Primary graph artifact not found: ${artifactPath}`);
    }

    const formData = new FormData();
    formData.append(
      'file',
      new Blob([artifact], { type: 'application/octet-stream' }),
      basename(artifactPath),
    );
    formData.append('config', JSON.stringify(toMinerPayload(config)));

    log.info(
      { artifactPath, artifactBytes: artifact.byteLength, graphKind: config.graphKind },
      'Requesting motif mining',
    );

    const outcome = await requestJson(
      `${this.options.baseUrl}/mine`,
      { service: SERVICE, method: 'POST', body: formData, timeoutMs, log },
      minerResponseSchema,
    );
    if (!outcome.ok) {
      return outcome;
    }

    const { motifs, statistics } = outcome.value;
    log.info({ motifCount: motifs.length }, 'Motif mining completed');
    return success({ motifs, statistics });
  }
}
