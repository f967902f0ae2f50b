import { resolve } from 'node:path';
import type { AuditConfig } from '../config.js';
import { resolveFileKind } from '../config.js';
import { buildRegistry } from '../compare/registry.js';
import type { Registry } from '../compare/types.js';
import { computeVerdicts } from '../compare/verdicts.js';
import { loadRecordFile } from '../records/loader.js';
import type { FileKind, RecordFile } from '../records/types.js';
import { indexRecordBlocks } from '../segmenter/extractor.js';
import { rewriteDerived, totalAnnotations, type RewriteResult } from '../rewriter/rewrite.js';
import { replaceWithBackup, type WriteResult } from '../applier/file-writer.js';
import type {
  AuditInputs,
  AuditMode,
  AuditOptions,
  AuditReport,
  FileSummary,
  JsonReport,
  NewVersionResult,
  PreconditionResult,
} from './types.js';

/**
 * Read both rule files and settle the addressing mode. Relative paths are
 * resolved against `options.cwd`; the addressing mode is detected from the
 * derived path as given, so the directories above it play no part.
 */
export async function loadAuditInputs(
  referencePath: string,
  derivedPath: string,
  options: AuditOptions,
): Promise<AuditInputs> {
  const { config } = options;
  const cwd = options.cwd ?? process.cwd();
  const reference = await loadRecordFile(resolve(cwd, referencePath), config.encoding);
  const derived = await loadRecordFile(resolve(cwd, derivedPath), config.encoding);
  const kind = resolveFileKind(options.unicode, derivedPath, config);
  return { kind, reference, derived };
}

/**
 * Register both files and compare them. Pure: nothing is printed or written.
 */
export function buildAuditReport(inputs: AuditInputs, config: AuditConfig): AuditReport {
  const { kind } = inputs;
  const referenceRegistry = buildRegistry(inputs.reference.records, kind, config.identityFields);
  const derivedRegistry = buildRegistry(inputs.derived.records, kind, config.identityFields);

  const verdicts = computeVerdicts(referenceRegistry, derivedRegistry, {
    ignoredFields: config.ignoredFields,
    untranslatedFields: config.untranslatedFields,
  });

  return {
    kind,
    reference: summarize(inputs.reference, referenceRegistry),
    derived: summarize(inputs.derived, derivedRegistry),
    verdicts,
  };
}

function summarize(file: RecordFile, registry: Registry): FileSummary {
  return {
    path: file.path,
    recordCount: file.records.length,
    registeredCount: registry.entries.length,
    duplicates: registry.duplicates,
    malformed: registry.malformed,
  };
}

/**
 * Duplicate keys in either file make every later step unreliable.
 * Checked once, after reporting and before any write.
 */
export function checkPreconditions(report: AuditReport): PreconditionResult {
  const duplicates = [
    ...report.reference.duplicates.map((d) => ({ ...d, file: 'reference' as const })),
    ...report.derived.duplicates.map((d) => ({ ...d, file: 'derived' as const })),
  ];
  if (duplicates.length > 0) {
    return { ok: false, reason: 'duplicate-keys', duplicates };
  }
  return { ok: true };
}

/**
 * Produce the annotated derived file in memory. The reference file's blocks
 * are indexed on first use, in a single scan.
 */
export function buildRewrite(inputs: AuditInputs, report: AuditReport, config: AuditConfig): RewriteResult {
  const segmenterOptions = { kind: inputs.kind, fields: config.identityFields };
  let blocks: Map<string, string[]> | null = null;

  const lookup = (key: string): string[] => {
    blocks ??= indexRecordBlocks(inputs.reference.lines, segmenterOptions);
    return blocks.get(key) ?? [];
  };

  return rewriteDerived(inputs.derived.lines, report.verdicts, lookup, segmenterOptions);
}

/**
 * The derived file is replaced only when the pass dropped earlier annotations
 * or added new ones.
 */
export function rewriteChangesFile(result: RewriteResult): boolean {
  return result.discardedAuditLines > 0 || totalAnnotations(result.counts) > 0;
}

export async function applyRewrite(
  derivedPath: string,
  result: RewriteResult,
  config: AuditConfig,
): Promise<WriteResult> {
  if (!rewriteChangesFile(result)) {
    return { success: true, action: 'unchanged', filePath: derivedPath, backupPath: null };
  }
  return replaceWithBackup(derivedPath, result.content, config.encoding);
}

/**
 * The new-version step: nothing is rewritten or backed up while either file
 * has duplicate keys.
 */
export async function writeNewVersion(
  inputs: AuditInputs,
  report: AuditReport,
  config: AuditConfig,
): Promise<NewVersionResult> {
  const precondition = checkPreconditions(report);
  if (!precondition.ok) {
    return { ok: false, duplicates: precondition.duplicates };
  }

  const rewrite = buildRewrite(inputs, report, config);
  const write = await applyRewrite(inputs.derived.path, rewrite, config);
  return { ok: true, rewrite, write };
}

export function toJsonReport(report: AuditReport, mode: AuditMode): JsonReport {
  const { verdicts } = report;
  return {
    version: 1,
    mode,
    kind: report.kind,
    referenceCount: report.reference.recordCount,
    derivedCount: report.derived.recordCount,
    untranslated: [...verdicts.untranslated].map(([key, count]) => ({ key, count })),
    missing: verdicts.missing,
    extra: verdicts.extra,
    differences: verdicts.differences,
    duplicates: [
      ...report.reference.duplicates.map((d) => ({ file: 'reference' as const, key: d.key, index: d.index })),
      ...report.derived.duplicates.map((d) => ({ file: 'derived' as const, key: d.key, index: d.index })),
    ],
    malformed: [
      ...report.reference.malformed.map((m) => ({ file: 'reference' as const, ...m })),
      ...report.derived.malformed.map((m) => ({ file: 'derived' as const, ...m })),
    ],
  };
}

export function describeKind(kind: FileKind): string {
  return kind === 'single-key' ? 'Unicode' : 'Non-Unicode';
}
