import { QueryError } from '../errors.js';
import type { AndNode, AttrNode, OrNode, QueryNode } from './types.js';

/** @internal Builds a frozen AND node without flattening. */
export function andNode(children: readonly QueryNode[]): AndNode {
  const node: AndNode = { kind: 'and', children: Object.freeze([...children]) };
  return Object.freeze(node);
}

/** @internal Builds a frozen OR node without flattening. */
export function orNode(children: readonly QueryNode[]): OrNode {
  const node: OrNode = { kind: 'or', children: Object.freeze([...children]) };
  return Object.freeze(node);
}

/** Freezes `value` and every object reachable from it, in place. */
function _deepFreeze(value: unknown, seen = new Set<object>()): void {
  if (typeof value !== 'object' || value === null || seen.has(value)) return;
  seen.add(value);
  Object.freeze(value);
  for (const member of Object.values(value)) _deepFreeze(member, seen);
}

/**
 * @internal Builds a frozen leaf. The payload is deep-frozen in place;
 * normalize() shares one leaf between every branch it appears in.
 */
export function attrNode<V>(type: string, ancestors: readonly string[], value: V): AttrNode<V> {
  _deepFreeze(value);
  const node: AttrNode<V> = {
    kind: 'attr',
    type,
    ancestors: Object.freeze([...ancestors]),
    value,
  };
  return Object.freeze(node);
}

/**
 * Collects the operands of a combinator. An operand of the same kind
 * contributes its children rather than itself, so `and(and(a, b), c)`
 * has three children, not two.
 */
function _flatten(kind: 'and' | 'or', operands: readonly QueryNode[]): QueryNode[] {
  const children: QueryNode[] = [];
  for (const operand of operands) {
    if (operand.kind === kind) {
      children.push(...operand.children);
    } else {
      children.push(operand);
    }
  }
  return children;
}

/**
 * Combine nodes so that all of them must hold. A single operand is
 * returned as-is.
 */
export function and(...operands: QueryNode[]): QueryNode {
  const [first, ...rest] = operands;
  if (first === undefined) {
    throw new QueryError('and() requires at least one operand');
  }
  if (rest.length === 0) return first;
  return andNode(_flatten('and', operands));
}

/**
 * Combine nodes so that at least one of them must hold. A single operand
 * is returned as-is.
 */
export function or(...operands: QueryNode[]): QueryNode {
  const [first, ...rest] = operands;
  if (first === undefined) {
    throw new QueryError('or() requires at least one operand');
  }
  if (rest.length === 0) return first;
  return orNode(_flatten('or', operands));
}
