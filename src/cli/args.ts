import { parseArgs } from 'node:util';
import type { UnicodeOption } from '../config.js';
import type { AuditMode } from '../pipeline/types.js';

export type OutputFormat = 'text' | 'json';

export interface CLIOptions {
  referencePath: string;
  derivedPath: string;
  mode: AuditMode;
  unicode: UnicodeOption;
  format: OutputFormat;
  configPath: string | undefined;
  verbose: boolean;
}

export type ParsedCLI =
  | { command: 'audit'; options: CLIOptions }
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'invalid'; message: string };

const MODES = new Map<string, AuditMode>([
  ['warnings', 'warnings'],
  ['new-version', 'new-version'],
  ['new_version', 'new-version'],
]);

const UNICODE_OPTIONS: readonly UnicodeOption[] = ['true', 'false', 'auto'];
const FORMATS: readonly OutputFormat[] = ['text', 'json'];

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      mode: { type: 'string', default: 'warnings' },
      unicode: { type: 'string', default: 'auto' },
      format: { type: 'string', default: 'text' },
      config: { type: 'string' },
      verbose: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', default: false },
    },
    strict: true,
    allowPositionals: true,
  });
}

export function parseCLIArgs(argv: string[]): ParsedCLI {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err: unknown) {
    return { command: 'invalid', message: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;

  if (values.help) return { command: 'help' };
  if (values.version) return { command: 'version' };

  if (positionals.length !== 2) {
    return {
      command: 'invalid',
      message: `Expected 2 files (English and translated), got ${positionals.length}`,
    };
  }

  const modeValue = values.mode ?? 'warnings';
  const mode = MODES.get(modeValue);
  if (!mode) {
    return { command: 'invalid', message: `Unknown --mode "${modeValue}" (use warnings or new-version)` };
  }

  const unicodeValue = values.unicode ?? 'auto';
  const unicode = UNICODE_OPTIONS.find((option) => option === unicodeValue);
  if (!unicode) {
    return { command: 'invalid', message: `Unknown --unicode "${unicodeValue}" (use true, false or auto)` };
  }

  const formatValue = values.format ?? 'text';
  const format = FORMATS.find((f) => f === formatValue);
  if (!format) {
    return { command: 'invalid', message: `Unknown --format "${formatValue}" (use text or json)` };
  }
  if (format === 'json' && mode !== 'warnings') {
    return { command: 'invalid', message: '--format json is only supported with --mode warnings' };
  }

  return {
    command: 'audit',
    options: {
      referencePath: positionals[0],
      derivedPath: positionals[1],
      mode,
      unicode,
      format,
      configPath: values.config,
      verbose: values.verbose ?? false,
    },
  };
}
