import type pg from 'pg';
import type { AttrValues } from '../../attrs/registry.js';
import { ClientError, QueryError } from '../../errors.js';
import { normalize } from '../../query/normalize.js';
import type { Branch, QueryNode } from '../../query/types.js';
import type { Walker } from '../../walker/walker.js';
import { resolveRunOptions, runBranches } from '../branches.js';
import type { ResolvedRunOptions } from '../branches.js';
import type { BranchRunOptions, ClientAdapter, SearchResult } from '../types.js';
import { catalogSupports, createSqlWalker } from './compiler.js';
import type { CompiledQuery, SqlConditions } from './compiler.js';
import { mapObservationRow } from './row-mapper.js';
import type { Observation, ObservationRow } from './row-mapper.js';
import { applyCatalogSchema } from './schema.js';

export interface CatalogClientConfig extends BranchRunOptions {
  pool: pg.Pool;
  /** Default 'catalog'. */
  name?: string;
  /** Row limit per branch. Default 1000. */
  limit?: number;
  canHandle?: (branch: Branch) => boolean;
  attrValues?: AttrValues;
}

/**
 * Client for an observation catalogue kept in Postgres. Each branch of the
 * normalized query runs as its own SELECT, concurrently, on the pool.
 */
export class CatalogClient implements ClientAdapter<Observation> {
  readonly name: string;
  private readonly pool: pg.Pool;
  private readonly walker: Walker<CompiledQuery[], SqlConditions>;
  private readonly run: ResolvedRunOptions;

  constructor(private readonly config: CatalogClientConfig) {
    const limit = config.limit ?? 1000;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new QueryError(`CatalogClient: limit must be a positive integer, got ${limit}`);
    }
    this.name = config.name ?? 'catalog';
    this.pool = config.pool;
    this.walker = createSqlWalker(limit);
    this.run = resolveRunOptions(config);
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applyCatalogSchema(client);
    } finally {
      client.release();
    }
  }

  canHandle(branch: Branch): boolean {
    return this.config.canHandle?.(branch) ?? branch.children.every(catalogSupports);
  }

  attrValues(): AttrValues {
    return this.config.attrValues ?? new Map();
  }

  /** One compiled query per branch, in branch order. */
  compile(query: QueryNode): CompiledQuery[] {
    return this.walker.create(normalize(query));
  }

  async search(query: QueryNode): Promise<SearchResult<Observation>> {
    const normal = normalize(query);
    const compiled = this.walker.create(normal);
    const branches = await runBranches(
      normal.children,
      async (_branch, index) => {
        const statement = compiled[index];
        if (statement === undefined) {
          throw new ClientError(`${this.name}: no query for branch ${index}`, undefined, index);
        }
        let result: pg.QueryResult<ObservationRow>;
        try {
          result = await this.pool.query<ObservationRow>(statement.sql, statement.params);
        } catch (err) {
          throw new ClientError(`Failed to query observations: ${String(err)}`, err, index);
        }
        return result.rows.map(mapObservationRow);
      },
      this.run,
    );
    return { client: this.name, branches };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
