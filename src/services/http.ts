/**
 * Shared transport for the downstream service clients.
 *
 * Turns a fetch call into a `StageOutcome`: timeouts, connection faults,
 * non-2xx answers and malformed payloads all come back as failures. Nothing
 * here retries.
 */

import type { z } from 'zod';
import { logger, type Logger } from '../logger.js';
import { failure, success, type StageOutcome } from '../pipeline/outcome.js';

const MAX_ERROR_BODY_CHARS = 2000;

export interface DownstreamRequest {
  /** Service label used in log lines and failure messages. */
  service: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | FormData;
  /** Deadline for the whole exchange, body read included. */
  timeoutMs: number;
  /** Logger carrying the caller's run context; the root logger when absent. */
  log?: Logger;
}

const isTimeout = (err: unknown): boolean =>
  err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');

const truncate = (text: string) =>
  text.length > MAX_ERROR_BODY_CHARS ? `${text.slice(0, MAX_ERROR_BODY_CHARS)}…` : text;

/**
 * Pull a human readable message out of an error body, from its `detail` or
 * `error` field when it has one.
 */
export const extractErrorMessage = (body: string): string => {
  try {
    const parsed: unknown = JSON.parse(body);
    if (parsed && typeof parsed === 'object') {
      if ('detail' in parsed && typeof parsed.detail === 'string') return parsed.detail;
      if ('error' in parsed && typeof parsed.error === 'string') return parsed.error;
    }
  } catch {
    // not JSON, fall through to the raw text
  }
  return body;
};

/**
 * Call a downstream endpoint and validate its JSON answer against `schema`.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  request: DownstreamRequest,
  schema: S,
): Promise<StageOutcome<z.infer<S>>> {
  const { service, method, headers, body, timeoutMs } = request;
  const log = request.log ?? logger;
  const startTime = Date.now();

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const elapsed = Date.now() - startTime;
    if (isTimeout(err)) {
      log.warn({ service, url, elapsed, timeoutMs }, 'Downstream request timed out');
      return failure('Timeout', `${service} did not respond within ${timeoutMs}ms`);
    }
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ service, url, err }, 'Downstream request failed');
    return failure('RemoteError', `Failed to connect to ${service}: ${message}`);
  }

  // the timeout signal keeps running while the body streams in
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    const elapsed = Date.now() - startTime;
    if (isTimeout(err)) {
      log.warn({ service, url, status: response.status, elapsed, timeoutMs }, 'Downstream response body timed out');
      return failure('Timeout', `${service} did not respond within ${timeoutMs}ms`);
    }
    const message = err instanceof Error ? err.message : String(err);
    log.warn({ service, url, status: response.status, err }, 'Failed to read downstream response body');
    return failure('RemoteError', `${service} response was cut off: ${message}`, { status: response.status });
  }
  const elapsed = Date.now() - startTime;

  if (!response.ok) {
    log.warn({ service, url, status: response.status, elapsed }, 'Downstream returned an error status');
    return failure(
      'RemoteError',
      `${service} returned ${response.status}: ${truncate(extractErrorMessage(text))}`,
      { status: response.status, body: truncate(text) },
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return failure('InvalidResponse', `${service} returned a non-JSON body`, {
      status: response.status,
      body: truncate(text),
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    log.warn({ service, url, issues }, 'Downstream response failed shape validation');
    return failure('InvalidResponse', `Invalid response from ${service}: ${issues}`, {
      status: response.status,
      body: truncate(text),
    });
  }

  log.debug({ service, url, elapsed }, 'Downstream request completed');
  return success(parsed.data);
}
