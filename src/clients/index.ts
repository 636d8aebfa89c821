// Public API barrel for the dnf-query/clients subpath.

export { runBranches, resolveRunOptions, fulfilledRows, checkAttrTypes } from './branches.js';
export type { ResolvedRunOptions } from './branches.js';
export { createParamsWalker } from './params.js';
export type { RequestParams } from './params.js';
export { UrlQueryClient } from './url-client.js';
export type { UrlQueryClientConfig, Transport } from './url-client.js';
export { CatalogClient } from './catalog/catalog-client.js';
export type { CatalogClientConfig } from './catalog/catalog-client.js';
export { compileBranchQuery, compileCatalogQueries } from './catalog/compiler.js';
export type { CompiledQuery } from './catalog/compiler.js';
export type { Observation } from './catalog/row-mapper.js';
export { Search } from './search.js';
export type { RoutedBranch, UnifiedResult } from './search.js';
export { EVE, XRS, GBM, SUVI } from './sources.js';
export type { SourceDescriptor } from './sources.js';
export type { ClientAdapter, SearchResult, BranchOutcome, BranchRunOptions } from './types.js';
