/**
 * Error taxonomy shared by the downstream clients and the coordinator.
 *
 * Only `ConfigError` is ever thrown. Everything else travels as a
 * `StageError` value inside a failed `StageOutcome`.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type StageErrorKind =
  | 'ValidationError'
  | 'Timeout'
  | 'RemoteError'
  | 'InvalidResponse'
  | 'NotReady'
  /** Local fault inside this service (temp workspace, a branch that threw). */
  | 'Internal';

export type StageName =
  | 'validation'
  | 'primary_graph'
  | 'secondary_graph'
  | 'mining'
  | 'readiness'
  | 'annotation';

export interface StageError {
  kind: StageErrorKind;
  message: string;
  /** Pipeline stage or branch the failure belongs to. */
  stage?: StageName;
  /** Remote HTTP status, when the downstream answered at all. */
  status?: number;
  /** Remote response body, truncated. */
  body?: string;
}

export interface RunError extends StageError {
  /** Every branch failure when more than one branch failed. */
  causes?: StageError[];
}

export const describeStageError = (error: StageError): string =>
  error.stage ? `${error.stage}: ${error.kind}: ${error.message}` : `${error.kind}: ${error.message}`;
