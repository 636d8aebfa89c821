import { ClientError, DispatchError, QueryError, StructuralError } from '../errors.js';
import type { AttrKind } from '../attrs/define.js';
import type { Branch } from '../query/types.js';
import type { BranchOutcome, BranchRunOptions, SearchResult } from './types.js';

export interface ResolvedRunOptions {
  concurrency: number;
  allOrNothing: boolean;
  onBranchError: (index: number, error: ClientError) => void;
}

export function resolveRunOptions(options: BranchRunOptions = {}): ResolvedRunOptions {
  const concurrency = options.concurrency ?? 4;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new QueryError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  return {
    concurrency,
    allOrNothing: options.allOrNothing ?? false,
    onBranchError: options.onBranchError ?? ((index, err) => {
      console.error(`[clients] branch ${index} failed:`, err);
    }),
  };
}

/**
 * Only a ClientError already tagged with `index` passes through. One from a
 * nested run (a client searching a single branch of a larger query) counts
 * from zero again and is wrapped with the outer index.
 */
function toClientError(err: unknown, index: number): ClientError {
  if (err instanceof ClientError && err.branchIndex === index) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ClientError(`Branch ${index} failed: ${detail}`, err, index);
}

/**
 * Runs `task` once per branch with at most `concurrency` tasks in flight.
 * A failing branch is reported through `onBranchError` and recorded as a
 * rejected outcome; its siblings keep running. Outcomes come back in
 * branch order regardless of completion order.
 *
 * DispatchError and StructuralError are not branch failures: no further
 * branch is started and the error is rethrown once in-flight tasks settle.
 */
export async function runBranches<T>(
  branches: readonly Branch[],
  task: (branch: Branch, index: number) => Promise<T>,
  options: ResolvedRunOptions,
): Promise<BranchOutcome<T>[]> {
  const queue = branches.map((branch, index) => ({ branch, index }));
  const outcomes: BranchOutcome<T>[] = [];
  const fatal: unknown[] = [];

  const worker = async (): Promise<void> => {
    for (let item = queue.shift(); item !== undefined; item = queue.shift()) {
      const { branch, index } = item;
      try {
        const value = await task(branch, index);
        outcomes.push({ status: 'fulfilled', index, branch, value });
      } catch (err) {
        if (err instanceof DispatchError || err instanceof StructuralError) {
          // Configuration bugs stop the whole run
          fatal.push(err);
          queue.length = 0;
          return;
        }
        const error = toClientError(err, index);
        options.onBranchError(index, error);
        outcomes.push({ status: 'rejected', index, branch, error });
      }
    }
  };

  const workers = Math.min(options.concurrency, branches.length);
  await Promise.all(Array.from({ length: workers }, worker));
  if (fatal.length > 0) throw fatal[0];

  outcomes.sort((a, b) => a.index - b.index);
  if (options.allOrNothing) {
    const failed = outcomes.find((outcome) => outcome.status === 'rejected');
    if (failed !== undefined && failed.status === 'rejected') throw failed.error;
  }
  return outcomes;
}

/** Values of the fulfilled branches, concatenated in branch order. */
export function fulfilledRows<T>(result: SearchResult<T>): T[] {
  return result.branches.flatMap((outcome) => (outcome.status === 'fulfilled' ? outcome.value : []));
}

/**
 * True when `branch` contains a leaf of every `required` kind and no leaf
 * outside `required` and `optional`.
 */
export function checkAttrTypes(
  branch: Branch,
  required: readonly AttrKind[],
  optional: readonly AttrKind[] = [],
): boolean {
  const allowed = [...required, ...optional];
  const everyLeafAllowed = branch.children.every((leaf) => allowed.some((kind) => kind.is(leaf)));
  const everyRequiredPresent = required.every((kind) => branch.children.some((leaf) => kind.is(leaf)));
  return everyLeafAllowed && everyRequiredPresent;
}
