import { and, or } from './builder.js';
import type { QueryNode } from './types.js';

/**
 * Fluent immutable wrapper around a query tree. Every operation returns a
 * new QueryExpression; the wrapped node is never mutated.
 */
export class QueryExpression {
  constructor(readonly node: QueryNode) {}

  /** Require the given nodes in addition to this expression. */
  and(...nodes: QueryNode[]): QueryExpression {
    return new QueryExpression(and(this.node, ...nodes));
  }

  /** Accept the given nodes as alternatives to this expression. */
  or(...nodes: QueryNode[]): QueryExpression {
    return new QueryExpression(or(this.node, ...nodes));
  }
}

/**
 * Entry point for the fluent query DSL.
 *
 * @example
 * query(Time('2012-08-09', '2012-08-10'))
 *   .and(or(Instrument('aia'), Instrument('hmi')))
 *   .node
 */
export function query(node: QueryNode | QueryExpression): QueryExpression {
  return node instanceof QueryExpression ? node : new QueryExpression(node);
}
