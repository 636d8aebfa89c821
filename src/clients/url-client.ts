import type { AttrValues } from '../attrs/registry.js';
import { ClientError, QueryError } from '../errors.js';
import { normalize } from '../query/normalize.js';
import type { Branch, QueryNode } from '../query/types.js';
import type { Walker } from '../walker/walker.js';
import { resolveRunOptions, runBranches } from './branches.js';
import type { ResolvedRunOptions } from './branches.js';
import { createParamsWalker } from './params.js';
import type { RequestParams } from './params.js';
import type { BranchRunOptions, ClientAdapter, SearchResult } from './types.js';

/** Performs the request for one branch. Supplied by the caller. */
export type Transport<T> = (url: URL, branch: Branch) => Promise<T[]>;

export interface UrlQueryClientConfig<T> extends BranchRunOptions {
  name: string;
  /** Endpoint the per-branch parameters are appended to. */
  baseUrl: string;
  transport: Transport<T>;
  canHandle?: (branch: Branch) => boolean;
  attrValues?: AttrValues;
  /** Defaults to createParamsWalker(). */
  walker?: Walker<RequestParams[], RequestParams>;
}

/**
 * Client for archives searched with GET query parameters. Each branch of
 * the normalized query becomes one URL; the transport fetches it.
 */
export class UrlQueryClient<T> implements ClientAdapter<T> {
  readonly name: string;
  private readonly baseUrl: URL;
  private readonly walker: Walker<RequestParams[], RequestParams>;
  private readonly run: ResolvedRunOptions;

  constructor(private readonly config: UrlQueryClientConfig<T>) {
    this.name = config.name;
    try {
      this.baseUrl = new URL(config.baseUrl);
    } catch (err) {
      throw new QueryError(`${config.name}: invalid baseUrl "${config.baseUrl}": ${String(err)}`);
    }
    this.walker = config.walker ?? createParamsWalker();
    this.run = resolveRunOptions(config);
  }

  canHandle(branch: Branch): boolean {
    return this.config.canHandle?.(branch) ?? true;
  }

  attrValues(): AttrValues {
    return this.config.attrValues ?? new Map();
  }

  /** One URL per branch, in branch order. */
  compile(query: QueryNode): URL[] {
    return this.walker.create(normalize(query)).map((params) => this.toUrl(params));
  }

  async search(query: QueryNode): Promise<SearchResult<T>> {
    const normal = normalize(query);
    // Compile everything before the first request so dispatch errors surface unchanged
    const urls = this.walker.create(normal).map((params) => this.toUrl(params));
    if (urls.length !== normal.children.length) {
      throw new ClientError(
        `${this.name}: walker produced ${urls.length} requests for ${normal.children.length} branches`,
      );
    }
    const branches = await runBranches(
      normal.children,
      (branch, index) => {
        const url = urls[index];
        if (url === undefined) {
          return Promise.reject(new ClientError(`${this.name}: no request for branch ${index}`, undefined, index));
        }
        return this.config.transport(url, branch);
      },
      this.run,
    );
    return { client: this.name, branches };
  }

  private toUrl(params: RequestParams): URL {
    const url = new URL(this.baseUrl.href);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.append(key, value);
    }
    return url;
  }
}
