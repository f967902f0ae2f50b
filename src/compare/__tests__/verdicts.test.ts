import { describe, it, expect } from 'vitest';
import { computeVerdicts, takeChain } from '../verdicts.js';
import { buildRegistry } from '../registry.js';
import { toRecordValue } from '../../records/value.js';
import type { IdentityFields } from '../../records/types.js';

const FIELDS: IdentityFields = { primary: 'name', secondary: 'tag' };
const OPTIONS = {
  ignoredFields: ['t', 'T', 'oc', 'OC', 'CT', 'ct'],
  untranslatedFields: ['t', 'ot', 'oc'],
};

function registry(...items: unknown[]) {
  return buildRegistry(items.map((item) => toRecordValue(item)), 'composite', FIELDS);
}

function rule(name: string, tag: string, extra: Record<string, unknown> = {}) {
  return { name, tag, ...extra };
}

// ---------------------------------------------------------------------------
// computeVerdicts
// ---------------------------------------------------------------------------

describe('computeVerdicts', () => {
  it('finds nothing for matching translated files', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'mi', { replace: [{ t: 'one' }] })),
      registry(rule('a', 'mi', { replace: [{ T: 'eins' }] })),
      OPTIONS,
    );

    expect(verdicts.untranslated.size).toBe(0);
    expect(verdicts.missing).toEqual([]);
    expect(verdicts.extra).toEqual([]);
    expect(verdicts.differences).toEqual([]);
    expect(verdicts.insertAfter.size).toBe(0);
  });

  it('counts untranslated fields per derived record', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'mi'), rule('b', 'mi')),
      registry(rule('b', 'mi', { replace: [{ t: 'x' }, { ot: 'y' }] }), rule('a', 'mi')),
      OPTIONS,
    );

    expect([...verdicts.untranslated]).toEqual([['b:mi', 2]]);
  });

  it('lists missing records with the key they follow', () => {
    const verdicts = computeVerdicts(
      registry(rule('w', 't0'), rule('x', 't1'), rule('y', 't2'), rule('z', 't3')),
      registry(rule('x', 't1'), rule('z', 't3')),
      OPTIONS,
    );

    expect(verdicts.missing).toEqual(['w:t0', 'y:t2']);
    expect([...verdicts.insertAfter]).toEqual([
      [null, 'w:t0'],
      ['x:t1', 'y:t2'],
    ]);
    expect(verdicts.differences).toEqual([]);
  });

  it('chains consecutive missing records', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'x'), rule('b', 'x'), rule('c', 'x'), rule('d', 'x'), rule('e', 'x'), rule('f', 'x')),
      registry(rule('a', 'x'), rule('f', 'x')),
      OPTIONS,
    );

    expect(verdicts.missing).toEqual(['b:x', 'c:x', 'd:x', 'e:x']);
    expect(takeChain(verdicts.insertAfter, 'a:x')).toEqual(['b:x', 'c:x', 'd:x', 'e:x']);
  });

  it('lists extra derived records in derived order', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'mi')),
      registry(rule('q', 'mi'), rule('a', 'mi'), rule('p', 'mi')),
      OPTIONS,
    );

    expect(verdicts.extra).toEqual(['q:mi', 'p:mi']);
  });

  it('does not report an extra oc field as a difference', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'mi', { match: '.' })),
      registry(rule('a', 'mi', { match: '.', oc: 'old' })),
      OPTIONS,
    );

    expect(verdicts.differences).toEqual([]);
    expect(verdicts.untranslated.get('a:mi')).toBe(1);
  });

  it('reports structural differences keyed by the reference order', () => {
    const verdicts = computeVerdicts(
      registry(rule('a', 'mi', { match: '.' }), rule('b', 'mi', { match: '.' })),
      registry(rule('b', 'mi', { match: '..' }), rule('a', 'mi', { match: '*' })),
      OPTIONS,
    );

    expect(verdicts.differences.map((d) => d.key)).toEqual(['a:mi', 'b:mi']);
    expect(verdicts.differences[1].warnings).toEqual([
      "Values don't match at path: b:mi['match']:",
      '  1: .',
      '  2: ..',
    ]);
  });
});

// ---------------------------------------------------------------------------
// takeChain
// ---------------------------------------------------------------------------

describe('takeChain', () => {
  it('returns nothing when the anchor has no follower', () => {
    const pending = new Map<string | null, string>([['a', 'b']]);
    expect(takeChain(pending, 'z')).toEqual([]);
    expect(pending.size).toBe(1);
  });

  it('follows links and removes them', () => {
    const pending = new Map<string | null, string>([
      [null, 'a'],
      ['a', 'b'],
      ['b', 'c'],
      ['x', 'y'],
    ]);

    expect(takeChain(pending, null)).toEqual(['a', 'b', 'c']);
    expect([...pending]).toEqual([['x', 'y']]);
  });

  it('emits a chain only once', () => {
    const pending = new Map<string | null, string>([['a', 'b']]);
    takeChain(pending, 'a');
    expect(takeChain(pending, 'a')).toEqual([]);
  });
});
