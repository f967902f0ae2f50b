import { describe, it, expect } from 'vitest';
import { buildRegistry } from '../registry.js';
import { toRecordValue } from '../../records/value.js';
import type { IdentityFields } from '../../records/types.js';

const FIELDS: IdentityFields = { primary: 'name', secondary: 'tag' };

function records(...items: unknown[]) {
  return items.map((item) => toRecordValue(item));
}

describe('buildRegistry', () => {
  it('registers records in file order with their predecessor', () => {
    const registry = buildRegistry(
      records({ name: 'a', tag: 'mi' }, { name: 'b', tag: 'mi' }, { name: 'c', tag: 'mo' }),
      'composite',
      FIELDS,
    );

    expect(registry.entries.map((e) => [e.key, e.index, e.previousKey])).toEqual([
      ['a:mi', 0, null],
      ['b:mi', 1, 'a:mi'],
      ['c:mo', 2, 'b:mi'],
    ]);
    expect(registry.byKey.get('b:mi')?.index).toBe(1);
    expect(registry.duplicates).toEqual([]);
    expect(registry.malformed).toEqual([]);
  });

  it('keeps the first occurrence of a duplicate key', () => {
    const registry = buildRegistry(
      records({ name: 'a', tag: 'mi', v: 1 }, { name: 'b', tag: 'mi' }, { name: 'a', tag: 'mi', v: 2 }),
      'composite',
      FIELDS,
    );

    expect(registry.entries).toHaveLength(2);
    expect(registry.byKey.get('a:mi')?.index).toBe(0);
    expect(registry.duplicates).toEqual([{ key: 'a:mi', index: 2, firstIndex: 0 }]);
  });

  it('skips duplicates and malformed records when linking predecessors', () => {
    const registry = buildRegistry(
      records({ name: 'a', tag: 'mi' }, { name: 'a', tag: 'mi' }, { match: '.' }, { name: 'c', tag: 'mi' }),
      'composite',
      FIELDS,
    );

    expect(registry.byKey.get('c:mi')?.previousKey).toBe('a:mi');
  });

  it('explains why a composite record was skipped', () => {
    const registry = buildRegistry(records({ name: 'a' }, 'text'), 'composite', FIELDS);

    expect(registry.entries).toEqual([]);
    expect(registry.malformed).toEqual([
      { index: 0, reason: 'missing or invalid "name"/"tag" fields' },
      { index: 1, reason: 'not a mapping (scalar)' },
    ]);
  });

  it('explains why a single-key record was skipped', () => {
    const registry = buildRegistry(records({ a: [], b: [] }, ['x']), 'single-key', FIELDS);

    expect(registry.malformed).toEqual([
      { index: 0, reason: 'expected exactly one key, found 2' },
      { index: 1, reason: 'not a mapping (sequence)' },
    ]);
  });

  it('keys single-key records by their only field', () => {
    const registry = buildRegistry(records({ 'α': [{ t: 'alpha' }] }, { 'β': [{ t: 'beta' }] }), 'single-key', FIELDS);

    expect(registry.entries.map((e) => e.key)).toEqual(['α', 'β']);
    expect(registry.entries[1].previousKey).toBe('α');
  });
});
