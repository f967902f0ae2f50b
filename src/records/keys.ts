import type { FileKind, IdentityFields, RecordValue } from './types.js';
import { getField, scalarToString } from './value.js';

/**
 * Derive a record's key. Returns undefined when the record lacks its identity fields.
 *
 * composite:  "<primary>:<secondary>", with a sequence-valued secondary field
 *             sorted and rendered as "[a, b]"
 * single-key: the record's only mapping key
 */
export function deriveRecordKey(
  record: RecordValue,
  kind: FileKind,
  fields: IdentityFields,
): string | undefined {
  if (record.kind !== 'mapping') return undefined;

  if (kind === 'single-key') {
    if (record.entries.length !== 1) return undefined;
    return record.entries[0][0];
  }

  const primary = getField(record, fields.primary);
  const secondary = getField(record, fields.secondary);
  if (!primary || !secondary) return undefined;
  if (primary.kind !== 'scalar' || primary.value === null) return undefined;

  let secondaryText: string;
  if (secondary.kind === 'sequence') {
    const parts: string[] = [];
    for (const item of secondary.items) {
      if (item.kind !== 'scalar') return undefined;
      parts.push(scalarToString(item.value));
    }
    secondaryText = `[${parts.sort().join(', ')}]`;
  } else if (secondary.kind === 'scalar' && secondary.value !== null) {
    secondaryText = scalarToString(secondary.value);
  } else {
    return undefined;
  }

  return `${scalarToString(primary.value)}:${secondaryText}`;
}

/**
 * Quote a key for display. Single-character keys (unicode definition files)
 * also show their code point, e.g. 'é' (Unicode char: \u00e9).
 */
export function formatKeyForDisplay(key: string): string {
  const codePoints = [...key];
  if (codePoints.length === 1) {
    const hex = (key.codePointAt(0) ?? 0).toString(16).padStart(4, '0');
    return `'${key}' (Unicode char: \\u${hex})`;
  }
  return `'${key}'`;
}
