import type { AuditReport, FileDuplicate, FileRole } from '../pipeline/types.js';
import type { MalformedRecord } from '../compare/types.js';
import type { AnnotationCounts, RewriteResult } from '../rewriter/rewrite.js';
import type { WriteResult } from '../applier/file-writer.js';
import { formatKeyForDisplay } from '../records/keys.js';
import { describeKind } from '../pipeline/audit.js';
import { color } from '../ui/theme.js';
import {
  step,
  substep,
  lastSub,
  success,
  error,
  warn,
  filePath,
  secondary,
  tertiary,
  treeCont,
  plural,
} from '../ui/format.js';
import { buildBanner } from '../ui/banner.js';

const FILE_LABELS: Record<FileRole, string> = {
  reference: 'English',
  derived: 'translated',
};

export function printHeader(commandLabel: string, reference: string, derived: string): void {
  for (const line of buildBanner(commandLabel, { reference, derived })) {
    console.log(line);
  }
  console.log();
}

export function printWarning(message: string): void {
  console.log(warn(message));
}

export function printError(message: string): void {
  console.log(error(message));
}

export function printVerbose(message: string): void {
  console.log(treeCont(tertiary(message)));
}

// === Report ===

export function printProcessing(report: AuditReport): void {
  console.log(step(`Processing ${report.reference.recordCount} items in ${describeKind(report.kind)} mode.`));
  console.log();
}

/**
 * Print every finding in the order the audit makes them: untranslated,
 * missing, extra, structural differences, then malformed records.
 */
export function printReport(report: AuditReport, ignoredFields: string[], verbose: boolean): void {
  const { verdicts } = report;

  for (const [key, count] of verdicts.untranslated) {
    console.log(`Rule ${color.key(formatKeyForDisplay(key))} still contains ${count} key(s) needing translating.`);
  }

  for (const key of verdicts.missing) {
    console.log(`Rule ${color.key(formatKeyForDisplay(key))} is missing in the translated file.`);
  }

  for (const key of verdicts.extra) {
    printWarning(`Rule ${formatKeyForDisplay(key)} in translated file is not in the English file.`);
  }

  const ignoredList = ignoredFields.join(', ');
  for (const difference of verdicts.differences) {
    printWarning(
      `Rule ${formatKeyForDisplay(difference.key)} contains differences other than ones in ${ignoredList} keys:`,
    );
    for (const warning of difference.warnings) {
      console.log(`  - ${warning}`);
    }
  }

  printMalformed('reference', report.reference.malformed, verbose);
  printMalformed('derived', report.derived.malformed, verbose);

  printReportSummary(report);
}

function printMalformed(role: FileRole, malformed: MalformedRecord[], verbose: boolean): void {
  if (malformed.length === 0) return;

  printWarning(
    `${plural(malformed.length, 'record')} in the ${FILE_LABELS[role]} file skipped (no usable key).`,
  );
  if (!verbose) return;
  for (const record of malformed) {
    printVerbose(`Item #${record.index + 1}: ${record.reason}`);
  }
}

function printReportSummary(report: AuditReport): void {
  const { verdicts } = report;
  const lines = [
    `Needs translation: ${color.bold(String(verdicts.untranslated.size))}`,
    `Missing: ${color.bold(String(verdicts.missing.length))}`,
    `Not in English file: ${color.bold(String(verdicts.extra.length))}`,
    `Structural differences: ${color.bold(String(verdicts.differences.length))}`,
  ];

  console.log();
  console.log(step('Summary'));
  for (let i = 0; i < lines.length; i++) {
    console.log(i === lines.length - 1 ? lastSub(lines[i]) : substep(lines[i]));
  }
  console.log();
}

export function printDuplicates(duplicates: FileDuplicate[]): void {
  for (const duplicate of duplicates) {
    printWarning(`Duplicate key ${formatKeyForDisplay(duplicate.key)} in ${FILE_LABELS[duplicate.file]} file.`);
  }
  console.log();
  printError('Stopping: Duplicate keys in the English or translated file may cause incorrect results.');
}

// === Rewrite ===

export function printInsertionPlan(insertAfter: ReadonlyMap<string | null, string>): void {
  if (insertAfter.size === 0) return;
  console.log(step('Missing rules'));
  for (const [anchor, missingKey] of insertAfter) {
    const where = anchor === null ? 'the start of the file' : anchor;
    printVerbose(`${missingKey} is missing after ${where}`);
  }
  console.log();
}

const COUNT_LABELS: Array<[keyof AnnotationCounts, string]> = [
  ['new-record', 'new rule(s) that need translation'],
  ['needs-translation', 'rule(s) that need translation of keys'],
  ['not-in-reference', 'rule(s) not in English file'],
  ['differences', 'rule(s) with differences other than translation'],
];

export function printRewriteResult(result: RewriteResult, write: WriteResult): void {
  if (write.action === 'unchanged') {
    console.log(lastSub(secondary(`No changes needed to ${write.filePath}.`)));
    console.log();
    return;
  }

  console.log(step(`New version of ${filePath(write.filePath)} created`));
  if (write.backupPath) {
    console.log(substep(`Original backed up to ${filePath(write.backupPath)}`));
  }
  if (result.discardedAuditLines > 0) {
    console.log(substep(secondary(`${plural(result.discardedAuditLines, 'previous audit comment')} discarded`)));
  }

  const counted = COUNT_LABELS.filter(([kind]) => result.counts[kind] > 0);
  counted.forEach(([kind, label], i) => {
    console.log(success(`${result.counts[kind]} ${label}`, i === counted.length - 1));
  });
  console.log();
}

export function printUnplaced(keys: string[]): void {
  for (const key of keys) {
    printWarning(`Rule ${formatKeyForDisplay(key)} could not be inserted: its position in the translated file was not found.`);
  }
}
