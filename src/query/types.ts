import { StructuralError } from '../errors.js';

/**
 * A single search constraint. `type` is the dispatch identity, `ancestors`
 * the extra keys a walker may fall back to, most specific first.
 */
export interface AttrNode<V = unknown> {
  readonly kind: 'attr';
  readonly type: string;
  readonly ancestors: readonly string[];
  readonly value: V;
}

/** All children must hold. */
export interface AndNode {
  readonly kind: 'and';
  readonly children: readonly QueryNode[];
}

/** At least one child must hold. */
export interface OrNode {
  readonly kind: 'or';
  readonly children: readonly QueryNode[];
}

export type QueryNode = AttrNode | AndNode | OrNode;

/**
 * One branch of a normalized query: a conjunction of leaves only.
 */
export interface Branch extends AndNode {
  readonly children: readonly AttrNode[];
}

/** Output of normalize(): an OR of branches. */
export interface NormalForm extends OrNode {
  readonly children: readonly Branch[];
}

/**
 * Dispatch descriptor. Walkers register handlers against `key` and
 * use `is` to hand the handler a node of the right shape.
 */
export interface NodeType<N extends QueryNode = QueryNode> {
  readonly key: string;
  is(node: QueryNode): node is N;
}

export type NodeOf<T> = T extends NodeType<infer N extends QueryNode> ? N : never;

export const Conjunction: NodeType<AndNode> = {
  key: 'and',
  is: (node): node is AndNode => node.kind === 'and',
};

export const Disjunction: NodeType<OrNode> = {
  key: 'or',
  is: (node): node is OrNode => node.kind === 'or',
};

/** Fallback for every leaf, whatever its type. */
export const AnyAttr: NodeType<AttrNode> = {
  key: 'attr',
  is: (node): node is AttrNode => node.kind === 'attr',
};

export const AnyNode: NodeType<QueryNode> = {
  key: 'node',
  is: (_node): _node is QueryNode => true,
};

/**
 * Keys a walker tries for `node`, from exact type to the catch-all.
 */
export function dispatchKeys(node: QueryNode): string[] {
  switch (node.kind) {
    case 'attr':
      return [node.type, ...node.ancestors, AnyAttr.key, AnyNode.key];
    case 'and':
      return [Conjunction.key, AnyNode.key];
    case 'or':
      return [Disjunction.key, AnyNode.key];
    default: {
      const unknown: never = node;
      throw new StructuralError(`Not a query node: ${describeNode(unknown)}`);
    }
  }
}

/** Name used in error messages for a node, including malformed ones. */
export function describeNode(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'kind' in node) {
    if (node.kind === 'attr' && 'type' in node && typeof node.type === 'string') {
      return node.type;
    }
    return String(node.kind);
  }
  return typeof node;
}
