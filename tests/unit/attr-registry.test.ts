import { describe, it, expect } from 'vitest';
import { mergeAttrValues, parseAttrValues } from '../../src/attrs/registry.js';
import { QueryError } from '../../src/errors.js';

describe('parseAttrValues', () => {
  it('parses value/description pairs per attr type', () => {
    const values = parseAttrValues({
      Instrument: [['TEST', 'A test instrument']],
      Level: [['0', 'Raw'], ['1', 'Calibrated']],
    });
    expect([...values.keys()]).toEqual(['Instrument', 'Level']);
    expect(values.get('Level')).toEqual([
      { value: '0', description: 'Raw' },
      { value: '1', description: 'Calibrated' },
    ]);
  });

  it('an empty object gives an empty catalogue', () => {
    expect(parseAttrValues({}).size).toBe(0);
  });

  it('rejects non-objects', () => {
    expect(() => parseAttrValues([])).toThrow(QueryError);
    expect(() => parseAttrValues(null, 'fixture')).toThrow('fixture: expected an object keyed by attr type');
  });

  it('rejects a type whose entry is not a list', () => {
    expect(() => parseAttrValues({ Level: 'x' })).toThrow(
      'attr values: "Level" must be a list of [value, description] pairs',
    );
  });

  it('rejects a pair of the wrong length', () => {
    expect(() => parseAttrValues({ Level: [['0']] })).toThrow(
      'attr values: "Level"[0] must be a [value, description] pair',
    );
  });

  it('rejects non-string members', () => {
    expect(() => parseAttrValues({ Level: [['0', 'Raw'], [1, 'Calibrated']] })).toThrow(
      'attr values: "Level"[1] must contain two strings',
    );
  });
});

describe('mergeAttrValues', () => {
  const first = parseAttrValues({ Instrument: [['ALPHA', 'first']] });
  const second = parseAttrValues({
    Instrument: [['alpha', 'duplicate'], ['BETA', 'second']],
    Level: [['0', 'Raw']],
  });

  it('concatenates entries for the same type in argument order', () => {
    const merged = mergeAttrValues(first, second);
    expect(merged.get('Instrument')).toEqual([
      { value: 'ALPHA', description: 'first' },
      { value: 'BETA', description: 'second' },
    ]);
  });

  it('keeps types present in only one catalogue', () => {
    expect(mergeAttrValues(first, second).get('Level')).toEqual([{ value: '0', description: 'Raw' }]);
  });

  it('does not modify its inputs', () => {
    mergeAttrValues(first, second);
    expect(first.get('Instrument')).toHaveLength(1);
  });

  it('no catalogues give an empty result', () => {
    expect(mergeAttrValues().size).toBe(0);
  });
});
