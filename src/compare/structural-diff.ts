import type { MappingValue, RecordValue, SequenceValue } from '../records/types.js';
import { getField, mappingKeys, renderValue } from '../records/value.js';

export interface CompareResult {
  warnings: string[];
  match: boolean;
}

/**
 * Compare two values, ignoring translatable fields at every mapping level.
 * Stops at the first mismatch; `warnings` explains it with a path such as
 * `name:tag['match'][0]`.
 */
export function compareValues(
  a: RecordValue,
  b: RecordValue,
  path: string,
  ignored: ReadonlySet<string>,
): CompareResult {
  if (a.kind === 'mapping' && b.kind === 'mapping') {
    return compareMappings(a, b, path, ignored);
  }
  if (a.kind === 'sequence' && b.kind === 'sequence') {
    return compareSequences(a, b, path, ignored);
  }
  if (a.kind === 'scalar' && b.kind === 'scalar' && a.value === b.value) {
    return { warnings: [], match: true };
  }
  return {
    warnings: [
      `Values don't match at path: ${path}:`,
      `  1: ${renderValue(a)}`,
      `  2: ${renderValue(b)}`,
    ],
    match: false,
  };
}

function compareMappings(
  a: MappingValue,
  b: MappingValue,
  path: string,
  ignored: ReadonlySet<string>,
): CompareResult {
  const keysA = mappingKeys(a).filter((k) => !ignored.has(k));
  const keysB = mappingKeys(b).filter((k) => !ignored.has(k));
  const setB = new Set(keysB);
  const setA = new Set(keysA);
  const onlyA = keysA.filter((k) => !setB.has(k));
  const onlyB = keysB.filter((k) => !setA.has(k));

  if (onlyA.length > 0 || onlyB.length > 0) {
    const warnings = [`Mappings don't have the same keys at path: ${path}`];
    if (onlyA.length > 0) {
      warnings.push(`Keys in first mapping that are not in second mapping: ${onlyA.join(', ')}`);
    }
    if (onlyB.length > 0) {
      warnings.push(`Keys in second mapping that are not in first mapping: ${onlyB.join(', ')}`);
    }
    return { warnings, match: false };
  }

  const warnings: string[] = [];
  for (const key of keysA) {
    const valueA = getField(a, key);
    const valueB = getField(b, key);
    if (!valueA || !valueB) continue;

    const result = compareValues(valueA, valueB, `${path}['${key}']`, ignored);
    warnings.push(...result.warnings);
    if (!result.match) return { warnings, match: false };
  }
  return { warnings, match: true };
}

function compareSequences(
  a: SequenceValue,
  b: SequenceValue,
  path: string,
  ignored: ReadonlySet<string>,
): CompareResult {
  if (a.items.length !== b.items.length) {
    return {
      warnings: [
        `Sequences don't have the same length at path: ${path} (${a.items.length} vs ${b.items.length})`,
      ],
      match: false,
    };
  }

  const warnings: string[] = [];
  for (let i = 0; i < a.items.length; i++) {
    const result = compareValues(a.items[i], b.items[i], `${path}[${i}]`, ignored);
    warnings.push(...result.warnings);
    if (!result.match) return { warnings, match: false };
  }
  return { warnings, match: true };
}

/**
 * Count fields named as untranslated markers anywhere in the tree.
 */
export function countUntranslatedFields(
  value: RecordValue,
  markers: ReadonlySet<string>,
): number {
  switch (value.kind) {
    case 'scalar':
      return 0;
    case 'sequence':
      return value.items.reduce((sum, item) => sum + countUntranslatedFields(item, markers), 0);
    case 'mapping': {
      let count = 0;
      for (const [key, child] of value.entries) {
        if (markers.has(key)) count++;
        count += countUntranslatedFields(child, markers);
      }
      return count;
    }
  }
}
