import { mergeAttrValues } from '../attrs/registry.js';
import type { AttrValues } from '../attrs/registry.js';
import { ClientError } from '../errors.js';
import { normalize } from '../query/normalize.js';
import type { Branch, QueryNode } from '../query/types.js';
import { resolveRunOptions, runBranches } from './branches.js';
import type { ResolvedRunOptions } from './branches.js';
import type { BranchOutcome, BranchRunOptions, ClientAdapter, SearchResult } from './types.js';

export interface RoutedBranch<T> {
  index: number;
  branch: Branch;
  clients: ClientAdapter<T>[];
}

export interface UnifiedResult<T> {
  /** One outcome per branch; a fulfilled outcome holds one result per client. */
  branches: BranchOutcome<SearchResult<T>[]>[];
}

/**
 * Searches several clients at once. The query is normalized, each branch
 * goes to every client whose canHandle accepts it, and results come back
 * grouped by branch in branch order.
 */
export class Search<T> {
  private readonly run: ResolvedRunOptions;

  constructor(
    private readonly clients: readonly ClientAdapter<T>[],
    options: BranchRunOptions = {},
  ) {
    this.run = resolveRunOptions(options);
  }

  /** Which clients each branch would be sent to. */
  route(query: QueryNode): RoutedBranch<T>[] {
    return normalize(query).children.map((branch, index) => ({
      index,
      branch,
      clients: this.clients.filter((client) => client.canHandle(branch)),
    }));
  }

  async search(query: QueryNode): Promise<UnifiedResult<T>> {
    const routes = this.route(query);
    const outcomes = await runBranches(
      routes.map((route) => route.branch),
      async (branch, index) => {
        const clients = routes[index]?.clients ?? [];
        if (clients.length === 0) {
          const types = branch.children.map((leaf) => leaf.type).join(', ');
          throw new ClientError(`No client can handle branch ${index} (${types})`, undefined, index);
        }
        return Promise.all(clients.map((client) => client.search(branch)));
      },
      this.run,
    );
    return { branches: outcomes };
  }

  /** Accepted values across all clients, per attr type. */
  attrValues(): AttrValues {
    return mergeAttrValues(...this.clients.map((client) => client.attrValues()));
  }
}
