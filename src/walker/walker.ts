import { DispatchError, StructuralError } from '../errors.js';
import type { HandlerTable } from '../errors.js';
import type { NodeOf, NodeType, QueryNode } from '../query/types.js';
import { describeNode, dispatchKeys } from '../query/types.js';
import type { Applier, Converter, Creator } from './types.js';

type NodeTypes = readonly NodeType[];

function _isAnyOf<T extends NodeTypes>(types: T, node: QueryNode): node is NodeOf<T[number]> {
  return types.some((type) => type.is(node));
}

function _guard<T extends NodeTypes>(types: T, node: QueryNode, table: HandlerTable): NodeOf<T[number]> {
  if (!_isAnyOf(types, node)) {
    throw new StructuralError(
      `${table} for ${types.map((t) => `"${t.key}"`).join(', ')} received a "${describeNode(node)}" node`,
    );
  }
  return node;
}

/**
 * Dispatch registry that compiles query trees into client-specific values.
 *
 * `R` is what `create` returns, `A` the accumulator `apply` fills in.
 * Handlers are looked up by the node's exact type first, then by each of
 * its ancestors (see dispatchKeys). Each client owns its own instance.
 *
 * @example
 * const walker = new Walker<Params[], Params>()
 *   .addCreator([Disjunction], (w, node) => node.children.flatMap((c) => w.create(c)))
 *   .addCreator([Conjunction], (w, node) => {
 *     const params: Params = {};
 *     w.apply(node, params);
 *     return [params];
 *   })
 *   .addApplier([Conjunction], (w, node, params) => node.children.forEach((c) => w.apply(c, params)));
 */
export class Walker<R, A = void> {
  private readonly creators = new Map<string, Creator<R, A>>();
  private readonly appliers = new Map<string, Applier<R, A>>();

  /** Dispatch `node` to its creator and return the result. */
  create(node: QueryNode): R {
    const creator = this.resolve(this.creators, node, 'creator');
    return creator(this, node);
  }

  /** Dispatch `node` to its applier, which mutates `acc`. */
  apply(node: QueryNode, acc: A): void {
    const applier = this.resolve(this.appliers, node, 'applier');
    applier(this, node, acc);
  }

  canCreate(node: QueryNode): boolean {
    return this.find(this.creators, node) !== undefined;
  }

  canApply(node: QueryNode): boolean {
    return this.find(this.appliers, node) !== undefined;
  }

  /** Register `creator` for every listed type. Re-registering a type replaces it. */
  addCreator<T extends NodeTypes>(types: T, creator: Creator<R, A, NodeOf<T[number]>>): this {
    const bound: Creator<R, A> = (walker, node) => creator(walker, _guard(types, node, 'creator'));
    for (const type of types) {
      this.creators.set(type.key, bound);
    }
    return this;
  }

  /** Register `applier` for every listed type. Re-registering a type replaces it. */
  addApplier<T extends NodeTypes>(types: T, applier: Applier<R, A, NodeOf<T[number]>>): this {
    const bound: Applier<R, A> = (walker, node, acc) => applier(walker, _guard(types, node, 'applier'), acc);
    for (const type of types) {
      this.appliers.set(type.key, bound);
    }
    return this;
  }

  /**
   * Register `converter` as both creator and applier for every listed type.
   * The converted node is dispatched again, so it must resolve to a
   * different handler or the walker recurses forever.
   */
  addConverter<T extends NodeTypes>(types: T, converter: Converter<NodeOf<T[number]>>): this {
    const create: Creator<R, A> = (walker, node) =>
      walker.create(converter(_guard(types, node, 'creator')));
    const apply: Applier<R, A> = (walker, node, acc) =>
      walker.apply(converter(_guard(types, node, 'applier')), acc);
    for (const type of types) {
      this.creators.set(type.key, create);
      this.appliers.set(type.key, apply);
    }
    return this;
  }

  private find<H>(table: ReadonlyMap<string, H>, node: QueryNode): H | undefined {
    for (const key of dispatchKeys(node)) {
      const handler = table.get(key);
      if (handler !== undefined) return handler;
    }
    return undefined;
  }

  private resolve<H>(table: ReadonlyMap<string, H>, node: QueryNode, name: HandlerTable): H {
    const handler = this.find(table, node);
    if (handler === undefined) {
      throw new DispatchError(describeNode(node), name);
    }
    return handler;
  }
}
