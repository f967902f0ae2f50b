import type { MappingValue, RecordValue, ScalarValue } from './types.js';

/**
 * Convert the plain JS produced by the YAML parser into a RecordValue tree.
 * Values the rule files never contain (dates, binary) fall back to their string form.
 */
export function toRecordValue(input: unknown): RecordValue {
  if (Array.isArray(input)) {
    return { kind: 'sequence', items: input.map((item) => toRecordValue(item)) };
  }
  if (input instanceof Map) {
    const entries: Array<[string, RecordValue]> = [];
    for (const [key, value] of input) {
      entries.push([String(key), toRecordValue(value)]);
    }
    return { kind: 'mapping', entries };
  }
  if (input !== null && typeof input === 'object') {
    return {
      kind: 'mapping',
      entries: Object.entries(input).map(([key, value]) => [key, toRecordValue(value)]),
    };
  }
  if (input === undefined || input === null) {
    return { kind: 'scalar', value: null };
  }
  if (typeof input === 'string' || typeof input === 'number' || typeof input === 'boolean') {
    return { kind: 'scalar', value: input };
  }
  return { kind: 'scalar', value: String(input) };
}

export function getField(mapping: MappingValue, key: string): RecordValue | undefined {
  const entry = mapping.entries.find(([k]) => k === key);
  return entry?.[1];
}

export function mappingKeys(mapping: MappingValue): string[] {
  return mapping.entries.map(([k]) => k);
}

export function scalarToString(value: ScalarValue): string {
  return value === null ? 'null' : String(value);
}

/**
 * Render a value on one line for reports, in YAML flow style.
 */
export function renderValue(value: RecordValue): string {
  switch (value.kind) {
    case 'scalar':
      return scalarToString(value.value);
    case 'sequence':
      return `[${value.items.map(renderValue).join(', ')}]`;
    case 'mapping':
      return `{${value.entries.map(([k, v]) => `${k}: ${renderValue(v)}`).join(', ')}}`;
  }
}
