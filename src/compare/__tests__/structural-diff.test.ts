import { describe, it, expect } from 'vitest';
import { compareValues, countUntranslatedFields } from '../structural-diff.js';
import { toRecordValue } from '../../records/value.js';

const IGNORED = new Set(['t', 'T', 'oc', 'OC', 'CT', 'ct']);

function compare(a: unknown, b: unknown, path = 'x:y') {
  return compareValues(toRecordValue(a), toRecordValue(b), path, IGNORED);
}

// ---------------------------------------------------------------------------
// compareValues
// ---------------------------------------------------------------------------

describe('compareValues', () => {
  it('matches records that differ only in translated text', () => {
    const result = compare(
      { name: 'x', tag: 'y', match: '.', replace: [{ t: 'square root' }] },
      { name: 'x', tag: 'y', match: '.', replace: [{ t: 'Quadratwurzel' }] },
    );
    expect(result).toEqual({ warnings: [], match: true });
  });

  it('ignores a translatable field present on one side only', () => {
    const result = compare(
      { replace: [{ T: 'pi', pause: 'short' }] },
      { replace: [{ pause: 'short' }] },
    );
    expect(result.match).toBe(true);
  });

  it('treats t and T as different ignored fields', () => {
    const result = compare({ replace: [{ t: 'a' }] }, { replace: [{ T: 'a' }] });
    expect(result.match).toBe(true);
  });

  it('reports a changed value with its path', () => {
    const result = compare({ match: '.' }, { match: '..' });
    expect(result).toEqual({
      warnings: ["Values don't match at path: x:y['match']:", '  1: .', '  2: ..'],
      match: false,
    });
  });

  it('reports keys found on only one side', () => {
    const result = compare({ match: '.', test: 'a' }, { match: '.', other: 'b' });
    expect(result.warnings).toEqual([
      "Mappings don't have the same keys at path: x:y",
      'Keys in first mapping that are not in second mapping: test',
      'Keys in second mapping that are not in first mapping: other',
    ]);
    expect(result.match).toBe(false);
  });

  it('lists only the side that has extra keys', () => {
    const result = compare({ a: 1, b: 2, c: 3 }, { a: 1 });
    expect(result.warnings).toEqual([
      "Mappings don't have the same keys at path: x:y",
      'Keys in first mapping that are not in second mapping: b, c',
    ]);
  });

  it('reports sequences of different length', () => {
    const result = compare({ replace: [{ x: 1 }, { x: 2 }] }, { replace: [{ x: 1 }] });
    expect(result.warnings).toEqual([
      "Sequences don't have the same length at path: x:y['replace'] (2 vs 1)",
    ]);
  });

  it('builds the path through nested sequences and mappings', () => {
    const result = compare(
      { replace: [{ x: 'a' }, { test: { if: 'c1' } }] },
      { replace: [{ x: 'a' }, { test: { if: 'c2' } }] },
    );
    expect(result.warnings[0]).toBe("Values don't match at path: x:y['replace'][1]['test']['if']:");
  });

  it('reports a change of kind as a value mismatch', () => {
    const result = compare({ tag: 'mi' }, { tag: ['mi', 'mn'] });
    expect(result.warnings).toEqual([
      "Values don't match at path: x:y['tag']:",
      '  1: mi',
      '  2: [mi, mn]',
    ]);
  });

  it('compares scalars by type as well as text', () => {
    expect(compare({ n: 1 }, { n: '1' }).match).toBe(false);
  });

  it('stops at the first mismatch', () => {
    const result = compare({ a: 1, b: 2 }, { a: 9, b: 8 });
    expect(result.warnings).toEqual(["Values don't match at path: x:y['a']:", '  1: 1', '  2: 9']);
  });
});

// ---------------------------------------------------------------------------
// countUntranslatedFields
// ---------------------------------------------------------------------------

describe('countUntranslatedFields', () => {
  const markers = new Set(['t', 'ot', 'oc']);

  it('counts marker fields at any depth', () => {
    const record = toRecordValue({
      name: 'x',
      tag: 'y',
      replace: [{ t: 'a' }, { ot: 'b' }, { T: 'c' }, { test: { if: '.', then: [{ oc: 'd' }] } }],
    });
    expect(countUntranslatedFields(record, markers)).toBe(3);
  });

  it('is zero for a fully translated record', () => {
    const record = toRecordValue({ name: 'x', tag: 'y', replace: [{ T: 'a' }, { OT: 'b' }] });
    expect(countUntranslatedFields(record, markers)).toBe(0);
  });

  it('is zero for a scalar', () => {
    expect(countUntranslatedFields(toRecordValue('t'), markers)).toBe(0);
  });
});
