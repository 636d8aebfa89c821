import { Range, Simple, Time } from '../../attrs/standard.js';
import { DispatchError, StructuralError } from '../../errors.js';
import { normalize } from '../../query/normalize.js';
import type { AttrNode, Branch, QueryNode } from '../../query/types.js';
import { Conjunction, Disjunction } from '../../query/types.js';
import { Walker } from '../../walker/walker.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** Accumulator for one branch. Never shared between branches. */
export interface SqlConditions {
  conditions: string[];
  params: unknown[];
}

export const OBSERVATION_COLUMNS = [
  'observation_id',
  'instrument',
  'source',
  'provider',
  'physobs',
  'level',
  'detector',
  'resolution',
  'satellite_number',
  'wavemin',
  'wavemax',
  'start_time',
  'end_time',
  'url',
].join(', ');

/** Simple attr type to the column it filters. */
const SIMPLE_COLUMNS: Readonly<Record<string, string>> = {
  Instrument: 'instrument',
  Source: 'source',
  Provider: 'provider',
  Physobs: 'physobs',
  Level: 'level',
  Detector: 'detector',
  Resolution: 'resolution',
  SatelliteNumber: 'satellite_number',
};

/** Pushes `value` and returns its placeholder. */
function bind(acc: SqlConditions, value: unknown): string {
  acc.params.push(value);
  return `$${acc.params.length}`;
}

function compileSelect(acc: SqlConditions, limit: number): CompiledQuery {
  const params = [...acc.params];
  params.push(limit);
  const lines = [`SELECT ${OBSERVATION_COLUMNS}`, 'FROM observations'];
  if (acc.conditions.length > 0) {
    lines.push(`WHERE ${acc.conditions.join(' AND ')}`);
  }
  lines.push('ORDER BY start_time ASC, observation_id ASC');
  lines.push(`LIMIT $${params.length}`);
  return { sql: lines.join('\n'), params };
}

/**
 * Walker compiling each branch into one parameterised SELECT over the
 * observations table. Time and Range match by interval overlap; Simple
 * attrs match case-insensitively on their column.
 */
export function createSqlWalker(limit: number): Walker<CompiledQuery[], SqlConditions> {
  return new Walker<CompiledQuery[], SqlConditions>()
    .addCreator([Disjunction], (walker, node) => node.children.flatMap((child) => walker.create(child)))
    .addCreator([Conjunction], (walker, node) => {
      const acc: SqlConditions = { conditions: [], params: [] };
      walker.apply(node, acc);
      return [compileSelect(acc, limit)];
    })
    .addApplier([Conjunction], (walker, node, acc) => {
      for (const child of node.children) walker.apply(child, acc);
    })
    .addApplier([Time], (_walker, node, acc) => {
      const end = bind(acc, node.value.end);
      const start = bind(acc, node.value.start);
      acc.conditions.push(`start_time <= ${end}::timestamptz AND end_time >= ${start}::timestamptz`);
    })
    .addApplier([Range], (_walker, node, acc) => {
      const max = bind(acc, node.value.max);
      const min = bind(acc, node.value.min);
      acc.conditions.push(`wavemin <= ${max} AND wavemax >= ${min}`);
    })
    .addApplier([Simple], (_walker, node, acc) => {
      const column = SIMPLE_COLUMNS[node.type];
      if (column === undefined) {
        throw new DispatchError(node.type, 'applier', `Catalog has no column for attr "${node.type}"`);
      }
      const ref = bind(acc, node.value);
      acc.conditions.push(
        typeof node.value === 'number' ? `${column} = ${ref}` : `lower(${column}) = lower(${ref})`,
      );
    });
}

/** Whether the catalogue has a column or interval rule for `leaf`. */
export function catalogSupports(leaf: AttrNode): boolean {
  if (Time.is(leaf) || Range.is(leaf)) return true;
  return Simple.is(leaf) && SIMPLE_COLUMNS[leaf.type] !== undefined;
}

/** Compiles one branch on its own. */
export function compileBranchQuery(branch: Branch, limit: number): CompiledQuery {
  const [compiled] = createSqlWalker(limit).create(branch);
  if (compiled === undefined) {
    throw new StructuralError('Branch compiled to no query');
  }
  return compiled;
}

/** One query per branch of `query`, in branch order. */
export function compileCatalogQueries(query: QueryNode, limit: number): CompiledQuery[] {
  return createSqlWalker(limit).create(normalize(query));
}
