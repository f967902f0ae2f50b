// === Parsed values ===

export type ScalarValue = string | number | boolean | null;

export interface MappingValue {
  kind: 'mapping';
  /** Entries in source order. */
  entries: Array<[string, RecordValue]>;
}

export interface SequenceValue {
  kind: 'sequence';
  items: RecordValue[];
}

export interface ScalarNode {
  kind: 'scalar';
  value: ScalarValue;
}

export type RecordValue = MappingValue | SequenceValue | ScalarNode;

// === Record addressing ===

/**
 * How a record yields its key:
 * - composite: primary + secondary identity fields ("name:tag")
 * - single-key: the record's sole mapping key (unicode definition files)
 */
export type FileKind = 'composite' | 'single-key';

export interface IdentityFields {
  primary: string;
  secondary: string;
}

// === Loaded file ===

export interface RecordFile {
  path: string;
  content: string;
  /** Raw lines, each keeping its line terminator. */
  lines: string[];
  records: RecordValue[];
}
