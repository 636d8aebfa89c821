import type { AttrValues } from '../attrs/registry.js';
import type { ClientError } from '../errors.js';
import type { Branch, QueryNode } from '../query/types.js';

export type BranchOutcome<T> =
  | { status: 'fulfilled'; index: number; branch: Branch; value: T }
  | { status: 'rejected'; index: number; branch: Branch; error: ClientError };

/** Results of one client, one outcome per branch in branch order. */
export interface SearchResult<T> {
  client: string;
  branches: BranchOutcome<T[]>[];
}

/**
 * A data source that can answer normalized queries. Implementations own
 * their walker; the query layer knows nothing about them.
 */
export interface ClientAdapter<T> {
  readonly name: string;
  /** Whether every leaf of `branch` is something this client can serve. */
  canHandle(branch: Branch): boolean;
  search(query: QueryNode): Promise<SearchResult<T>>;
  /** Values this client accepts, per attr type. Descriptive only. */
  attrValues(): AttrValues;
}

export interface BranchRunOptions {
  /** Maximum branches in flight at once. Default 4. */
  concurrency?: number;
  /** Reject the whole search when any branch fails. Default false. */
  allOrNothing?: boolean;
  onBranchError?: (index: number, error: ClientError) => void;
}
