import type { PipelineRun } from './types.js';

/**
 * Keeps the most recent finished runs in memory so a run id can be looked up
 * after the pipeline call returned. Nothing survives a restart.
 */
export class RunRegistry {
  private readonly runs = new Map<string, PipelineRun>();

  constructor(private readonly limit: number) {}

  record(run: PipelineRun): void {
    this.runs.delete(run.runId);
    this.runs.set(run.runId, run);

    // Map iterates in insertion order, so the first key is the oldest run
    while (this.runs.size > this.limit) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
  }

  get(runId: string): PipelineRun | undefined {
    return this.runs.get(runId);
  }

  get size(): number {
    return this.runs.size;
  }
}
