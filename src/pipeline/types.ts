import type { AuditConfig, UnicodeOption } from '../config.js';
import type { DiffVerdicts, DuplicateKey, MalformedRecord } from '../compare/types.js';
import type { FileKind, RecordFile } from '../records/types.js';
import type { RewriteResult } from '../rewriter/rewrite.js';
import type { WriteResult } from '../applier/file-writer.js';

export type AuditMode = 'warnings' | 'new-version';

export type FileRole = 'reference' | 'derived';

export interface AuditOptions {
  mode: AuditMode;
  unicode: UnicodeOption;
  config: AuditConfig;
  /** Directory relative paths are read from. Defaults to process.cwd(). */
  cwd?: string;
}

export interface FileSummary {
  path: string;
  recordCount: number;
  registeredCount: number;
  duplicates: DuplicateKey[];
  malformed: MalformedRecord[];
}

export interface AuditReport {
  kind: FileKind;
  reference: FileSummary;
  derived: FileSummary;
  verdicts: DiffVerdicts;
}

export interface AuditInputs {
  kind: FileKind;
  reference: RecordFile;
  derived: RecordFile;
}

export interface FileDuplicate extends DuplicateKey {
  file: FileRole;
}

export type PreconditionResult =
  | { ok: true }
  | { ok: false; reason: 'duplicate-keys'; duplicates: FileDuplicate[] };

/** Result of `--mode new-version`: stopped by the duplicate-key gate, or rewritten. */
export type NewVersionResult =
  | { ok: false; duplicates: FileDuplicate[] }
  | { ok: true; rewrite: RewriteResult; write: WriteResult };

/** Shape of `--format json` output. */
export interface JsonReport {
  version: 1;
  mode: AuditMode;
  kind: FileKind;
  referenceCount: number;
  derivedCount: number;
  untranslated: Array<{ key: string; count: number }>;
  missing: string[];
  extra: string[];
  differences: Array<{ key: string; warnings: string[] }>;
  duplicates: Array<{ file: FileRole; key: string; index: number }>;
  malformed: Array<{ file: FileRole; index: number; reason: string }>;
}
