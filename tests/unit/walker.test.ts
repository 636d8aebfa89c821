import { describe, it, expect, vi } from 'vitest';
import { Walker } from '../../src/walker/walker.js';
import { and, or } from '../../src/query/builder.js';
import { normalize } from '../../src/query/normalize.js';
import { AnyAttr, AnyNode, Conjunction, Disjunction } from '../../src/query/types.js';
import type { AttrNode, NodeType } from '../../src/query/types.js';
import { Instrument, Level, Simple, Time, ValueAttr, Wavelength } from '../../src/attrs/standard.js';
import { DispatchError, StructuralError } from '../../src/errors.js';

type Params = Record<string, string>;

const t = Time('2012-08-09', '2012-08-10');

function paramsWalker(): Walker<Params[], Params> {
  return new Walker<Params[], Params>()
    .addCreator([Disjunction], (walker, node) => node.children.flatMap((child) => walker.create(child)))
    .addCreator([Conjunction], (walker, node) => {
      const params: Params = {};
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
    .addConverter([Level], (node) => ValueAttr({ level: String(node.value) }));
}

describe('Walker', () => {

  // ---------------------------------------------------------------------------
  // Compiling a normalized tree
  // ---------------------------------------------------------------------------
  describe('compiling a normalized query', () => {
    it('produces one params object per branch, in branch order', () => {
      const walker = paramsWalker();
      const result = walker.create(normalize(and(t, or(Level('0'), Level('1')))));
      expect(result).toEqual([
        { startTime: '2012-08-09T00:00:00.000Z', endTime: '2012-08-10T00:00:00.000Z', level: '0' },
        { startTime: '2012-08-09T00:00:00.000Z', endTime: '2012-08-10T00:00:00.000Z', level: '1' },
      ]);
    });

    it('allocates a fresh accumulator per branch', () => {
      const walker = paramsWalker();
      const [first, second] = walker.create(normalize(or(Level('0'), Level('1'))));
      expect(first).toEqual({ level: '0' });
      expect(second).toEqual({ level: '1' });
      expect(first).not.toBe(second);
    });

    it('returns an empty list for a query with no branches', () => {
      expect(paramsWalker().create({ kind: 'or', children: [] })).toEqual([]);
    });

    it('is reentrant: the same walker compiles several queries independently', () => {
      const walker = paramsWalker();
      const a = walker.create(normalize(Level('0')));
      const b = walker.create(normalize(Level('2')));
      expect(a).toEqual([{ level: '0' }]);
      expect(b).toEqual([{ level: '2' }]);
    });
  });

  // ---------------------------------------------------------------------------
  // Resolution order
  // ---------------------------------------------------------------------------
  describe('resolution', () => {
    it('uses an ancestor handler when the exact type is not registered', () => {
      const walker = new Walker<string>().addCreator([Simple], (_w, node) => `simple:${node.type}=${node.value}`);
      expect(walker.create(Instrument('aia'))).toBe('simple:Instrument=aia');
      expect(walker.create(Level(2))).toBe('simple:Level=2');
    });

    it('prefers the exact type over an ancestor', () => {
      const walker = new Walker<string>()
        .addCreator([Simple], () => 'simple')
        .addCreator([Instrument], () => 'instrument');
      expect(walker.create(Instrument('aia'))).toBe('instrument');
      expect(walker.create(Level(2))).toBe('simple');
    });

    it('falls back to AnyAttr for leaves with no registered type or kind', () => {
      const walker = new Walker<string>().addCreator([AnyAttr], (_w, node) => `attr:${node.type}`);
      expect(walker.create(Wavelength(171))).toBe('attr:Wavelength');
    });

    it('falls back to AnyNode for composites', () => {
      const walker = new Walker<string>().addCreator([AnyNode], (_w, node) => node.kind);
      expect(walker.create(and(t, Level(1)))).toBe('and');
      expect(walker.create(or(t, Level(1)))).toBe('or');
    });

    it('canCreate reports whether a creator resolves', () => {
      const walker = new Walker<string>().addCreator([Wavelength], () => 'exact');
      expect(walker.canCreate(Wavelength(171))).toBe(true);
      expect(walker.canCreate(t)).toBe(false);
    });

    it('throws DispatchError naming the type when nothing resolves', () => {
      const walker = new Walker<string>().addCreator([Simple], () => 'simple');
      expect(() => walker.create(t)).toThrow(DispatchError);
      try {
        walker.create(t);
      } catch (err) {
        expect(err).toBeInstanceOf(DispatchError);
        if (err instanceof DispatchError) {
          expect(err.nodeType).toBe('Time');
          expect(err.table).toBe('creator');
        }
      }
    });

    it('apply throws DispatchError from the applier table', () => {
      const walker = new Walker<string, string[]>().addCreator([Time], () => 'created');
      expect(() => walker.apply(t, [])).toThrow(
        'No applier registered for node type "Time" or any of its ancestors',
      );
    });

    it('a DispatchError deep in the tree propagates out of create unchanged', () => {
      const walker = paramsWalker();
      const q = normalize(and(t, Instrument('aia')));
      expect(() => walker.create(q)).toThrow(
        'No applier registered for node type "Instrument" or any of its ancestors',
      );
    });

    it('names composite kinds in DispatchError', () => {
      const walker = new Walker<string>();
      expect(() => walker.create(or(t, Level(1)))).toThrow('No creator registered for node type "or"');
    });
  });

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------
  describe('registration', () => {
    it('addCreator registers one function for every listed type', () => {
      const walker = new Walker<string>().addCreator([Time, Level], (_w, node) => node.type);
      expect(walker.create(t)).toBe('Time');
      expect(walker.create(Level(1))).toBe('Level');
    });

    it('the last registration for a type wins', () => {
      const walker = new Walker<string>()
        .addCreator([Time], () => 'first')
        .addCreator([Time], () => 'second');
      expect(walker.create(t)).toBe('second');
    });

    it('creator and applier tables are independent', () => {
      const walker = new Walker<string, string[]>().addApplier([Time], (_w, node, acc) => {
        acc.push(node.value.start);
      });
      const acc: string[] = [];
      walker.apply(t, acc);
      expect(acc).toEqual(['2012-08-09T00:00:00.000Z']);
      expect(walker.canApply(t)).toBe(true);
      expect(walker.canCreate(t)).toBe(false);
    });

    it('addConverter registers into both tables and re-dispatches the converted node', () => {
      const converter = vi.fn((node: AttrNode<string | number>) => ValueAttr({ level: String(node.value) }));
      const walker = new Walker<string, Params>()
        .addCreator([ValueAttr], (_w, node) => JSON.stringify(node.value))
        .addApplier([ValueAttr], (_w, node, params) => {
          Object.assign(params, node.value);
        })
        .addConverter([Level], converter);

      expect(walker.create(Level(3))).toBe('{"level":"3"}');
      const params: Params = {};
      walker.apply(Level(4), params);
      expect(params).toEqual({ level: '4' });
      expect(converter).toHaveBeenCalledTimes(2);
    });

    it('registration methods return the walker for chaining', () => {
      const walker = new Walker<string>();
      expect(walker.addCreator([Time], () => 'x')).toBe(walker);
      expect(walker.addApplier([Time], () => undefined)).toBe(walker);
      expect(walker.addConverter([Level], (node) => node)).toBe(walker);
    });

    it('walkers do not share registrations', () => {
      const a = new Walker<string>().addCreator([Time], () => 'a');
      const b = new Walker<string>();
      expect(a.canCreate(t)).toBe(true);
      expect(b.canCreate(t)).toBe(false);
    });

    it('throws StructuralError when a handler receives a node its types do not match', () => {
      const impostor: NodeType<AttrNode> = {
        key: 'Time',
        is: (_node): _node is AttrNode => false,
      };
      const walker = new Walker<string>().addCreator([impostor], () => 'never');
      expect(() => walker.create(t)).toThrow(StructuralError);
      expect(() => walker.create(t)).toThrow('creator for "Time" received a "Time" node');
    });
  });
});
