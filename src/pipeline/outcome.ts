import type { StageError, StageErrorKind, StageName } from '../errors.js';

export interface StageSuccess<T> {
  ok: true;
  value: T;
}

export interface StageFailure {
  ok: false;
  error: StageError;
}

/** Result of exactly one stage or branch. Adapters return these instead of throwing. */
export type StageOutcome<T> = StageSuccess<T> | StageFailure;

export const success = <T>(value: T): StageSuccess<T> => ({ ok: true, value });

export const failure = (
  kind: StageErrorKind,
  message: string,
  details: Omit<StageError, 'kind' | 'message'> = {},
): StageFailure => ({ ok: false, error: { kind, message, ...details } });

/** Attribute a failure to a stage without overwriting an attribution already made closer to the fault. */
export const withStage = <T>(outcome: StageOutcome<T>, stage: StageName): StageOutcome<T> => {
  if (outcome.ok || outcome.error.stage) {
    return outcome;
  }
  return { ok: false, error: { ...outcome.error, stage } };
};
