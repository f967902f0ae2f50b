import { readFile } from 'node:fs/promises';
import { parseDocument } from 'yaml';
import type { RecordFile, RecordValue } from './types.js';
import { toRecordValue } from './value.js';

/** Repeated fields inside a record are allowed; the last one wins. */
export const PARSE_OPTIONS = { uniqueKeys: false } as const;

/**
 * Split text into lines, each keeping its terminator, so that
 * joining the result reproduces the input exactly.
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Parse YAML text whose root is a sequence of records.
 * Tabs are treated as spaces. An empty document is an empty sequence.
 */
export function parseRecords(content: string, sourceName: string): RecordValue[] {
  const doc = parseDocument(content.replace(/\t/g, ' '), PARSE_OPTIONS);
  if (doc.errors.length > 0) {
    throw new Error(`Failed to parse ${sourceName}: ${doc.errors[0].message}`);
  }

  const root = toRecordValue(doc.toJS());
  if (root.kind === 'scalar' && root.value === null) return [];
  if (root.kind !== 'sequence') {
    throw new Error(`${sourceName} must contain a sequence of records at the root`);
  }
  return root.items;
}

/**
 * Read and parse one rule file. The encoding is applied to this read only.
 */
export async function loadRecordFile(
  filePath: string,
  encoding: BufferEncoding,
): Promise<RecordFile> {
  let content: string;
  try {
    content = await readFile(filePath, encoding);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read ${filePath}: ${msg}`);
  }

  return {
    path: filePath,
    content,
    lines: splitLines(content),
    records: parseRecords(content, filePath),
  };
}
