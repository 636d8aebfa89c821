import { Range, Simple, Time, ValueAttr } from '../attrs/standard.js';
import { Conjunction, Disjunction } from '../query/types.js';
import { Walker } from '../walker/walker.js';

/** One flat request: parameter name to value. */
export type RequestParams = Record<string, string>;

function paramName(type: string): string {
  return type.charAt(0).toLowerCase() + type.slice(1);
}

/**
 * Walker that turns a normalized query into one RequestParams per branch.
 *
 * Typed leaves are first converted into ValueAttrs; only ValueAttr has an
 * applier. A Simple attr becomes `{ <type in camelCase>: value }`, Time
 * becomes `startTime`/`endTime`, a Range becomes `wavemin`/`wavemax`.
 * Callers may register more converters on the returned walker.
 */
export function createParamsWalker(): Walker<RequestParams[], RequestParams> {
  return new Walker<RequestParams[], RequestParams>()
    .addCreator([Disjunction], (walker, node) => node.children.flatMap((child) => walker.create(child)))
    .addCreator([Conjunction, ValueAttr], (walker, node) => {
      const params: RequestParams = {};
      walker.apply(node, params);
      return [params];
    })
    .addApplier([Conjunction], (walker, node, params) => {
      for (const child of node.children) walker.apply(child, params);
    })
    .addApplier([ValueAttr], (_walker, node, params) => {
      Object.assign(params, node.value);
    })
    .addConverter([Time], (node) => ValueAttr({ startTime: node.value.start, endTime: node.value.end }))
    .addConverter([Simple], (node) => ValueAttr({ [paramName(node.type)]: String(node.value) }))
    .addConverter([Range], (node) => ValueAttr({
      wavemin: String(node.value.min),
      wavemax: String(node.value.max),
    }));
}
