import type { DiffVerdicts, RecordDifference, Registry } from './types.js';
import { compareValues, countUntranslatedFields } from './structural-diff.js';

export interface VerdictOptions {
  ignoredFields: Iterable<string>;
  untranslatedFields: Iterable<string>;
}

/**
 * Compare the derived registry against the reference registry.
 */
export function computeVerdicts(
  reference: Registry,
  derived: Registry,
  options: VerdictOptions,
): DiffVerdicts {
  const ignored = new Set(options.ignoredFields);
  const markers = new Set(options.untranslatedFields);

  const untranslated = new Map<string, number>();
  for (const entry of derived.entries) {
    if (entry.record.kind !== 'mapping') continue;
    const count = countUntranslatedFields(entry.record, markers);
    if (count > 0) untranslated.set(entry.key, count);
  }

  const missing: string[] = [];
  const insertAfter = new Map<string | null, string>();
  for (const entry of reference.entries) {
    if (derived.byKey.has(entry.key)) continue;
    missing.push(entry.key);
    insertAfter.set(entry.previousKey, entry.key);
  }

  const extra = derived.entries
    .filter((entry) => !reference.byKey.has(entry.key))
    .map((entry) => entry.key);

  const differences: RecordDifference[] = [];
  for (const entry of reference.entries) {
    const other = derived.byKey.get(entry.key);
    if (!other) continue;
    const result = compareValues(entry.record, other.record, entry.key, ignored);
    if (!result.match) {
      differences.push({ key: entry.key, warnings: result.warnings });
    }
  }

  return { untranslated, missing, extra, differences, insertAfter };
}

/**
 * Take the insertion chain that starts after `anchor` out of `pending`: the
 * missing key that goes right after it, then the one right after that, and so
 * on. Each link is removed, so a chain is only ever emitted once.
 */
export function takeChain(
  pending: Map<string | null, string>,
  anchor: string | null,
): string[] {
  const chain: string[] = [];
  let current = anchor;
  let next = pending.get(current);
  while (next !== undefined) {
    pending.delete(current);
    chain.push(next);
    current = next;
    next = pending.get(current);
  }
  return chain;
}
