import type { RecordValue } from '../records/types.js';

// === Registry ===

export interface RegistryEntry {
  key: string;
  record: RecordValue;
  /** Position in the file's root sequence. */
  index: number;
  /** Key of the previously registered record, null for the first. */
  previousKey: string | null;
}

export interface DuplicateKey {
  key: string;
  index: number;
  firstIndex: number;
}

export interface MalformedRecord {
  index: number;
  reason: string;
}

export interface Registry {
  /** Registered records in file order. */
  entries: RegistryEntry[];
  byKey: Map<string, RegistryEntry>;
  duplicates: DuplicateKey[];
  malformed: MalformedRecord[];
}

// === Verdicts ===

export interface RecordDifference {
  key: string;
  warnings: string[];
}

export interface DiffVerdicts {
  /** Derived-file keys still holding untranslated fields, with the field count. */
  untranslated: Map<string, number>;
  /** Reference keys absent from the derived file, in reference order. */
  missing: string[];
  /** Derived keys absent from the reference file, in derived order. */
  extra: string[];
  /** Keys in both files whose structure differs outside translatable fields. */
  differences: RecordDifference[];
  /**
   * Anchor key -> missing key to insert right after it. The null anchor is the
   * start of the file. Chains are followed transitively.
   */
  insertAfter: Map<string | null, string>;
}
