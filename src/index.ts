export { and, or } from './query/builder.js';
export { query, QueryExpression } from './query/query-object.js';
export { normalize, assertNormalForm, isNormalForm, branches } from './query/normalize.js';
export { Conjunction, Disjunction, AnyAttr, AnyNode } from './query/types.js';
export type {
  AttrNode,
  AndNode,
  OrNode,
  QueryNode,
  Branch,
  NormalForm,
  NodeType,
  NodeOf,
} from './query/types.js';
export { Walker } from './walker/walker.js';
export type { Creator, Applier, Converter } from './walker/types.js';
export { defineAttr, defineAttrKind } from './attrs/define.js';
export type { AttrKind, AttrDefinition, AttrOptions } from './attrs/define.js';
export {
  Simple,
  Range,
  Time,
  Wavelength,
  Instrument,
  Level,
  Source,
  Provider,
  Physobs,
  Detector,
  Resolution,
  SatelliteNumber,
  ValueAttr,
} from './attrs/standard.js';
export type { TimeRange, WavelengthRange, WavelengthUnit, SimpleValue } from './attrs/standard.js';
export { parseAttrValues, mergeAttrValues } from './attrs/registry.js';
export type { AttrValue, AttrValues } from './attrs/registry.js';
export { QueryError, StructuralError, DispatchError, ClientError } from './errors.js';
export type { HandlerTable } from './errors.js';
