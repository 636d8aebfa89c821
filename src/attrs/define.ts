import { QueryError } from '../errors.js';
import { attrNode } from '../query/builder.js';
import { AnyAttr, AnyNode, Conjunction, Disjunction } from '../query/types.js';
import type { AttrNode, NodeType, QueryNode } from '../query/types.js';

/** Dispatch keys of the built-in node types; no attr or kind may take one. */
const RESERVED_KEYS: ReadonlySet<string> = new Set([
  Conjunction.key,
  Disjunction.key,
  AnyAttr.key,
  AnyNode.key,
]);

/**
 * A leaf category. Walkers can register handlers against a kind and every
 * attr declaring it among its parents falls back to that handler.
 */
export interface AttrKind<V = unknown> extends NodeType<AttrNode<V>> {
  /** This kind's key followed by its ancestors, most specific first. */
  readonly lineage: readonly string[];
}

/** Factory for one concrete leaf type. */
export interface AttrDefinition<V, Args extends unknown[]> extends AttrKind<V> {
  (...args: Args): AttrNode<V>;
  readonly type: string;
}

export interface AttrOptions<V, Args extends unknown[]> {
  /** Kinds this attr also answers to, most specific first. */
  parents?: readonly AttrKind[];
  /** Validates the arguments and builds the immutable payload. */
  create: (...args: Args) => V;
}

function _lineageOf(parents: readonly AttrKind[]): string[] {
  const seen = new Set<string>();
  for (const parent of parents) {
    for (const key of parent.lineage) seen.add(key);
  }
  return [...seen];
}

function _checkKey(key: string, caller: string): void {
  if (key.trim() === '') {
    throw new QueryError(`${caller}: key must be a non-empty string`);
  }
  if (RESERVED_KEYS.has(key)) {
    throw new QueryError(`${caller}: "${key}" is reserved for a built-in node type`);
  }
}

function _matcher<V>(key: string): (node: QueryNode) => node is AttrNode<V> {
  return (node): node is AttrNode<V> =>
    node.kind === 'attr' && (node.type === key || node.ancestors.includes(key));
}

export function defineAttrKind<V>(key: string, parents: readonly AttrKind[] = []): AttrKind<V> {
  _checkKey(key, 'defineAttrKind');
  return {
    key,
    lineage: [key, ..._lineageOf(parents)],
    is: _matcher<V>(key),
  };
}

/**
 * Defines a leaf type and returns its factory. The payload `create`
 * returns is deep-frozen.
 *
 * @example
 * const Level = defineAttr('Level', {
 *   parents: [Simple],
 *   create: (value: string | number) => value,
 * });
 * Level('0CS'); // { kind: 'attr', type: 'Level', ancestors: ['Simple'], value: '0CS' }
 */
export function defineAttr<V, Args extends unknown[]>(
  type: string,
  options: AttrOptions<V, Args>,
): AttrDefinition<V, Args> {
  _checkKey(type, 'defineAttr');
  const ancestors = _lineageOf(options.parents ?? []);
  const factory = (...args: Args): AttrNode<V> => attrNode(type, ancestors, options.create(...args));
  return Object.assign(factory, {
    key: type,
    type,
    lineage: [type, ...ancestors],
    is: _matcher<V>(type),
  });
}
