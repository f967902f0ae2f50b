import type { FileKind, IdentityFields, RecordValue } from '../records/types.js';
import { deriveRecordKey } from '../records/keys.js';
import type { DuplicateKey, MalformedRecord, Registry, RegistryEntry } from './types.js';

/**
 * Register records in file order. The first occurrence of a key wins; later
 * ones are listed as duplicates. Records without identity fields are listed
 * as malformed and left out.
 */
export function buildRegistry(
  records: RecordValue[],
  kind: FileKind,
  fields: IdentityFields,
): Registry {
  const entries: RegistryEntry[] = [];
  const byKey = new Map<string, RegistryEntry>();
  const duplicates: DuplicateKey[] = [];
  const malformed: MalformedRecord[] = [];

  let previousKey: string | null = null;

  records.forEach((record, index) => {
    const key = deriveRecordKey(record, kind, fields);
    if (key === undefined) {
      malformed.push({ index, reason: describeMalformed(record, kind, fields) });
      return;
    }

    const first = byKey.get(key);
    if (first) {
      duplicates.push({ key, index, firstIndex: first.index });
      return;
    }

    const entry: RegistryEntry = { key, record, index, previousKey };
    entries.push(entry);
    byKey.set(key, entry);
    previousKey = key;
  });

  return { entries, byKey, duplicates, malformed };
}

function describeMalformed(record: RecordValue, kind: FileKind, fields: IdentityFields): string {
  if (record.kind !== 'mapping') return `not a mapping (${record.kind})`;
  if (kind === 'single-key') {
    return `expected exactly one key, found ${record.entries.length}`;
  }
  return `missing or invalid "${fields.primary}"/"${fields.secondary}" fields`;
}
