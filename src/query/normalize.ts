import { StructuralError } from '../errors.js';
import type { AttrNode, Branch, NormalForm, QueryNode } from './types.js';
import { describeNode } from './types.js';

/**
 * Expands `node` into its DNF branches, each a list of leaves.
 *
 * AND distributes over OR by Cartesian product: the first child varies
 * slowest, so `a & (b | c) & (d | e)` yields abd, abe, acd, ace.
 */
function expand(node: QueryNode): AttrNode[][] {
  switch (node.kind) {
    case 'attr':
      return [[node]];

    case 'and': {
      let products: AttrNode[][] = [[]];
      for (const child of node.children) {
        const alternatives = expand(child);
        const next: AttrNode[][] = [];
        for (const prefix of products) {
          for (const alternative of alternatives) {
            next.push([...prefix, ...alternative]);
          }
        }
        products = next;
      }
      return products;
    }

    case 'or':
      return node.children.flatMap(expand);

    default: {
      const unknown: never = node;
      throw new StructuralError(`Cannot normalize unknown node: ${describeNode(unknown)}`);
    }
  }
}

/**
 * Rewrites `root` into disjunctive normal form: an OR whose children are
 * ANDs of leaves only. A bare leaf or a leaf-only AND is wrapped the same
 * way, so every consumer sees exactly one shape.
 *
 * Pure and idempotent. Sibling order is never changed and duplicate
 * branches are kept.
 */
export function normalize(root: QueryNode): NormalForm {
  const normal: NormalForm = { kind: 'or', children: Object.freeze(branches(root)) };
  return Object.freeze(normal);
}

/**
 * Throws StructuralError unless `node` is already in the shape produced
 * by normalize().
 */
export function assertNormalForm(node: QueryNode): asserts node is NormalForm {
  if (node.kind !== 'or') {
    throw new StructuralError(`Normal form root must be an OR node, got ${describeNode(node)}`);
  }
  node.children.forEach((branch, index) => {
    if (branch.kind !== 'and') {
      throw new StructuralError(
        `Branch ${index} must be an AND node, got ${describeNode(branch)}`,
      );
    }
    for (const leaf of branch.children) {
      if (leaf.kind !== 'attr') {
        throw new StructuralError(
          `Branch ${index} must contain leaves only, got ${describeNode(leaf)}`,
        );
      }
    }
  });
}

/** True when every branch check in assertNormalForm passes. */
export function isNormalForm(node: QueryNode): node is NormalForm {
  return node.kind === 'or'
    && node.children.every(
      (branch) => branch.kind === 'and' && branch.children.every((leaf) => leaf.kind === 'attr'),
    );
}

/**
 * The branches of `root` after normalization, in output order.
 */
export function branches(root: QueryNode): Branch[] {
  return expand(root).map((leaves) => {
    const branch: Branch = { kind: 'and', children: Object.freeze(leaves) };
    return Object.freeze(branch);
  });
}
