import type { QueryNode } from '../query/types.js';
import type { Walker } from './walker.js';

/** Produces a value for `node`. */
export type Creator<R, A, N extends QueryNode = QueryNode> = (
  walker: Walker<R, A>,
  node: N,
) => R;

/** Writes what `node` contributes into `acc`. Return value is ignored. */
export type Applier<R, A, N extends QueryNode = QueryNode> = (
  walker: Walker<R, A>,
  node: N,
  acc: A,
) => void;

/**
 * Rewrites `node` into another node that the walker already knows how to
 * handle, typically a ValueAttr.
 */
export type Converter<N extends QueryNode = QueryNode> = (node: N) => QueryNode;
