#!/usr/bin/env node
import { resolve } from 'node:path';
import { parseCLIArgs, type CLIOptions } from './cli/args.js';
import { loadConfig } from './config.js';
import {
  buildAuditReport,
  checkPreconditions,
  loadAuditInputs,
  toJsonReport,
  writeNewVersion,
} from './pipeline/audit.js';
import type { FileDuplicate } from './pipeline/types.js';
import {
  printDuplicates,
  printError,
  printHeader,
  printInsertionPlan,
  printProcessing,
  printReport,
  printRewriteResult,
  printUnplaced,
} from './utils/logger.js';
import { brand, color } from './ui/theme.js';
import { step } from './ui/format.js';
import { VERSION } from './ui/banner.js';

function printHelp(): void {
  console.log(`
${brand.amber('rule-audit')} <english.yaml> <translated.yaml> [options]

Compare a translated rules file with its English version.

${color.bold('Options:')}
  --mode <mode>        warnings (default): list differences
                       new-version: rewrite the translated file with # [AUDIT] comments
  --unicode <value>    true | false | auto (default): treat files as unicode
                       definitions; auto looks for "unicode" in the translated path
  --format <format>    text (default) or json (warnings mode only)
  --config <file>      JSON file overriding identity, ignored and untranslated fields
  --verbose            Show skipped records and insertion points
  --version            Print the version
  -h, --help           Show this help
`.trimEnd());
}

async function main(): Promise<void> {
  const cli = parseCLIArgs(process.argv.slice(2));

  switch (cli.command) {
    case 'help':
      printHelp();
      return;
    case 'version':
      console.log(VERSION);
      return;
    case 'invalid':
      printError(cli.message);
      console.log();
      printHelp();
      process.exit(1);
    case 'audit':
      if (cli.options.format === 'json') {
        await runJsonAudit(cli.options);
      } else {
        await runAudit(cli.options);
      }
      return;
  }
}

// === Text report / rewrite ===

async function runAudit(opts: CLIOptions): Promise<void> {
  printHeader(
    opts.mode === 'new-version' ? 'New version' : 'Warnings',
    resolve(opts.referencePath),
    resolve(opts.derivedPath),
  );

  const config = await loadConfig(opts.configPath);
  const inputs = await loadAuditInputs(opts.referencePath, opts.derivedPath, {
    mode: opts.mode,
    unicode: opts.unicode,
    config,
  });

  const report = buildAuditReport(inputs, config);
  printProcessing(report);
  printReport(report, config.ignoredFields, opts.verbose);

  if (opts.mode !== 'new-version') {
    const precondition = checkPreconditions(report);
    if (!precondition.ok) stopOnDuplicates(precondition.duplicates);
    return;
  }

  const outcome = await writeNewVersion(inputs, report, config);
  if (!outcome.ok) stopOnDuplicates(outcome.duplicates);

  console.log(step('Creating new version of translated file with comments where translation is needed'));
  if (opts.verbose) {
    printInsertionPlan(report.verdicts.insertAfter);
  }
  console.log();

  printUnplaced(outcome.rewrite.unplaced);
  if (!outcome.write.success) {
    printError(outcome.write.error ?? `Could not write ${inputs.derived.path}`);
    process.exit(1);
  }
  printRewriteResult(outcome.rewrite, outcome.write);
}

function stopOnDuplicates(duplicates: FileDuplicate[]): never {
  printDuplicates(duplicates);
  process.exit(1);
}

// === JSON report ===

async function runJsonAudit(opts: CLIOptions): Promise<void> {
  try {
    const config = await loadConfig(opts.configPath);
    const inputs = await loadAuditInputs(opts.referencePath, opts.derivedPath, {
      mode: opts.mode,
      unicode: opts.unicode,
      config,
    });
    const report = buildAuditReport(inputs, config);
    console.log(JSON.stringify(toJsonReport(report, opts.mode), null, 2));

    if (!checkPreconditions(report).ok) {
      process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ version: 1, error: msg }));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  printError(
    `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
  );
  process.exit(1);
});
