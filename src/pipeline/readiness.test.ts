import { describe, it, expect, vi } from 'vitest';
import { ReadinessProber } from './readiness.js';
import { failure, success } from './outcome.js';
import type { GraphBuilder } from './types.js';

const makeBuilder = () => ({
  load: vi.fn<GraphBuilder['load']>(),
  getJob: vi.fn<GraphBuilder['getJob']>(),
});

describe('ReadinessProber', () => {
  it('should report ready when the job is completed', async () => {
    const builder = makeBuilder();
    builder.getJob.mockResolvedValue(success({ jobId: 'N1', status: 'completed' }));

    const prober = new ReadinessProber(builder, 250);

    await expect(prober.isReady('N1')).resolves.toBe(true);
    expect(builder.getJob).toHaveBeenCalledWith('N1', 250);
  });

  it('should answer not ready the same way on repeated probes of an unfinished job', async () => {
    const builder = makeBuilder();
    builder.getJob.mockResolvedValue(success({ jobId: 'N1', status: 'processing' }));

    const prober = new ReadinessProber(builder, 250);

    await expect(prober.isReady('N1')).resolves.toBe(false);
    await expect(prober.isReady('N1')).resolves.toBe(false);
    expect(builder.getJob).toHaveBeenCalledTimes(2);
    expect(builder.load).not.toHaveBeenCalled();
  });

  it('should probe exactly once per call', async () => {
    const builder = makeBuilder();
    builder.getJob.mockResolvedValue(success({ jobId: 'N1', status: 'queued' }));

    await new ReadinessProber(builder, 250).isReady('N1');

    expect(builder.getJob).toHaveBeenCalledTimes(1);
  });

  it.each([
    ['timeout', failure('Timeout', 'AtomSpace builder did not respond within 250ms')],
    ['error status', failure('RemoteError', 'AtomSpace builder returned 500: boom', { status: 500 })],
    ['malformed payload', failure('InvalidResponse', 'Invalid response from AtomSpace builder: status: Required')],
  ])('should treat a %s as not ready', async (_label, outcome) => {
    const builder = makeBuilder();
    builder.getJob.mockResolvedValue(outcome);

    await expect(new ReadinessProber(builder, 250).isReady('N1')).resolves.toBe(false);
  });

  it('should only accept the exact completed status', async () => {
    const builder = makeBuilder();
    builder.getJob.mockResolvedValue(success({ jobId: 'N1', status: 'COMPLETED' }));

    await expect(new ReadinessProber(builder, 250).isReady('N1')).resolves.toBe(false);
  });
});
