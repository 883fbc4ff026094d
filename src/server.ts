import express from 'express';
import type { Request, Response, NextFunction, Express } from 'express';
import { z } from 'zod';
import { logger } from './logger.js';
import type { PipelineCoordinator } from './pipeline/coordinator.js';
import type { RunRegistry } from './pipeline/run-registry.js';
import type { AnnotationResult, PipelineRun, RunPipelineInput, TabularInput } from './pipeline/types.js';

export interface ServerDeps {
  coordinator: Pick<PipelineCoordinator, 'runPipeline' | 'annotate' | 'checkReadiness'>;
  registry: RunRegistry;
  maxUploadBytes: number;
}

const annotateRequestSchema = z.object({
  run_id: z.string().min(1),
  stage2_job_id: z.string().min(1),
  selected_motif: z.record(z.string(), z.unknown()),
});

class RequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

class BadRequestError extends RequestError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'BadRequestError';
  }
}

class PayloadTooLargeError extends RequestError {
  constructor(maxBytes: number) {
    super(`Request body too large (max ${maxBytes} bytes)`, 413);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Pipeline outcomes are always returned as a body; the status code only
 * summarises them for HTTP clients.
 */
const runStatusCode = (run: PipelineRun): number => {
  if (run.status !== 'total_failure') return 200;
  switch (run.error?.kind) {
    case 'ValidationError':
      return 400;
    case 'Internal':
      return 500;
    default:
      return 502;
  }
};

const annotationStatusCode = (result: AnnotationResult): number => {
  if (result.status === 'annotated') return 200;
  switch (result.error?.kind) {
    case 'NotReady':
      return 409;
    case 'Internal':
      return 500;
    default:
      return 502;
  }
};

/**
 * Reject uploads whose declared size exceeds the limit before reading any of the body.
 * Bodies without a Content-Length are counted as they stream in by {@link readFormData}.
 */
const limitUploadSize = (maxBytes: number) => (req: Request, res: Response, next: NextFunction): void => {
  const contentLength = parseInt(req.headers['content-length'] ?? '0', 10);
  if (contentLength > maxBytes) {
    res.status(413).json({ error: new PayloadTooLargeError(maxBytes).message });
    return;
  }
  next();
};

/** Parse a multipart body of at most `maxBytes` through the fetch Request API. */
const readFormData = async (req: Request, maxBytes: number): Promise<FormData> => {
  const contentType = req.headers['content-type'] ?? '';
  if (!contentType.startsWith('multipart/form-data')) {
    throw new BadRequestError('Expected a multipart/form-data body');
  }

  let received = 0;
  async function* counted(source: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
    for await (const chunk of source) {
      received += chunk.byteLength;
      if (received > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }
      yield chunk;
    }
  }

  const webRequest = new globalThis.Request(`http://localhost${req.originalUrl}`, {
    method: req.method,
    headers: { 'content-type': contentType },
    // leave the request undestroyed on an early stop so the 413 can still be written
    body: counted(req.iterator({ destroyOnReturn: false })),
    duplex: 'half',
  });
  try {
    return await webRequest.formData();
  } catch (err) {
    // the parser may wrap the stream error, so go by the byte count
    if (received > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new BadRequestError(`Malformed multipart body: ${message}`);
  }
};

const requireField = (form: FormData, name: string): string => {
  const value = form.get(name);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new BadRequestError(`Missing form field: ${name}`);
  }
  return value;
};

const optionalField = (form: FormData, name: string): string | undefined => {
  const value = form.get(name);
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
};

const readTabularFiles = async (form: FormData): Promise<TabularInput[]> => {
  const entries = [...form.getAll('file'), ...form.getAll('files')];
  const files: TabularInput[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      throw new BadRequestError('File fields must carry file uploads');
    }
    if (!entry.name.toLowerCase().endsWith('.csv')) {
      throw new BadRequestError(`Only CSV files are supported (got ${entry.name})`);
    }
    files.push({ fileName: entry.name, content: Buffer.from(await entry.arrayBuffer()) });
  }
  if (files.length === 0) {
    throw new BadRequestError('At least one CSV file is required');
  }
  return files;
};

const parseMiningField = (raw: string | undefined): unknown => {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequestError('mining_config must be valid JSON');
  }
};

export const createServer = (deps: ServerDeps): Express => {
  const { coordinator, registry, maxUploadBytes } = deps;
  const app: Express = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', service: 'integration-service' });
  });

  app.post(
    '/api/pipeline/execute',
    limitUploadSize(maxUploadBytes),
    async (req: Request, res: Response) => {
      let input: RunPipelineInput;
      try {
        const form = await readFormData(req, maxUploadBytes);
        input = {
          files: await readTabularFiles(form),
          config: requireField(form, 'config'),
          schema: requireField(form, 'schema_json'),
          tenantId: optionalField(form, 'tenant_id'),
          sessionId: optionalField(form, 'session_id'),
          mining: parseMiningField(optionalField(form, 'mining_config')),
        };
      } catch (err) {
        if (err instanceof RequestError) {
          res.status(err.status).json({ error: err.message });
          return;
        }
        logger.error({ err }, 'Failed to read pipeline request');
        res.status(500).json({ error: 'Failed to read pipeline request' });
        return;
      }

      try {
        const run = await coordinator.runPipeline(input);
        res.status(runStatusCode(run)).json(run);
      } catch (err) {
        logger.error({ err }, 'Pipeline execution crashed');
        res.status(500).json({ error: 'Pipeline execution failed' });
      }
    },
  );

  app.post('/api/pipeline/annotate', express.json({ limit: '1mb' }), async (req: Request, res: Response) => {
    const parse = annotateRequestSchema.safeParse(req.body);
    if (!parse.success) {
      res.status(400).json({ error: parse.error.flatten() });
      return;
    }

    const { run_id: runId, stage2_job_id: stage2JobId, selected_motif: motif } = parse.data;
    try {
      const result = await coordinator.annotate({ runId, stage2JobId, motif });
      res.status(annotationStatusCode(result)).json(result);
    } catch (err) {
      logger.error({ err, runId, stage2JobId }, 'Annotation crashed');
      res.status(500).json({ error: 'Annotation failed' });
    }
  });

  app.get('/api/pipeline/runs/:runId', (req: Request, res: Response) => {
    const run = registry.get(req.params.runId);
    if (!run) {
      res.status(404).json({ error: 'Run not found' });
      return;
    }
    res.json(run);
  });

  app.get('/api/pipeline/jobs/:jobId/readiness', async (req: Request, res: Response) => {
    try {
      const ready = await coordinator.checkReadiness(req.params.jobId);
      res.json({ jobId: req.params.jobId, ready });
    } catch (err) {
      logger.error({ err, jobId: req.params.jobId }, 'Readiness check crashed');
      res.status(500).json({ error: 'Failed to check readiness' });
    }
  });

  // body-parser failures (malformed JSON, oversized body) carry their own status
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;
    if (status >= 500) {
      logger.error({ err }, 'Unhandled request error');
    }
    res.status(status).json({ error: err instanceof Error ? err.message : 'Request failed' });
  });

  return app;
};
