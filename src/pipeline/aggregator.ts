import type { StageName } from '../errors.js';
import { logger } from '../logger.js';
import { failure, withStage, type StageOutcome } from './outcome.js';

export interface Branch<T> {
  name: StageName;
  run: () => Promise<StageOutcome<T>>;
}

// async wrapper so a synchronous throw in `run` becomes a rejection too
const start = async <T>(branch: Branch<T>): Promise<StageOutcome<T>> => branch.run();

const toOutcome = <T>(
  result: PromiseSettledResult<StageOutcome<T>>,
  name: StageName,
): StageOutcome<T> => {
  if (result.status === 'fulfilled') {
    return withStage(result.value, name);
  }
  const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
  logger.error({ err: result.reason, branch: name }, 'Pipeline branch threw instead of returning an outcome');
  return failure('Internal', `${name} branch failed unexpectedly: ${message}`, { stage: name });
};

/**
 * Run every branch concurrently and wait for all of them.
 *
 * A failing branch never cancels or short-circuits its siblings. Outcomes are
 * returned in submission order, whatever order the branches finish in.
 */
export async function settleAll<T>(branches: ReadonlyArray<Branch<T>>): Promise<StageOutcome<T>[]> {
  const results = await Promise.allSettled(branches.map((branch) => start(branch)));
  return results.map((result, index) => toOutcome(result, branches[index].name));
}

/** Two-branch form of {@link settleAll} that keeps each branch's value type. */
export async function settleBoth<A, B>(
  first: Branch<A>,
  second: Branch<B>,
): Promise<[StageOutcome<A>, StageOutcome<B>]> {
  const [a, b] = await Promise.allSettled([start(first), start(second)]);
  return [toOutcome(a, first.name), toOutcome(b, second.name)];
}
