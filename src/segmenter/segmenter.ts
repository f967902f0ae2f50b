import { parseDocument } from 'yaml';
import type { FileKind, IdentityFields } from '../records/types.js';
import { deriveRecordKey } from '../records/keys.js';
import { PARSE_OPTIONS } from '../records/loader.js';
import { toRecordValue } from '../records/value.js';
import {
  escapeRegex,
  indentationOf,
  isAuditComment,
  isBlank,
  isContentLine,
  isDocumentStart,
  isNormalComment,
  isSequenceItem,
  keyTokenFromLine,
} from './lines.js';

export interface SegmenterOptions {
  kind: FileKind;
  fields: IdentityFields;
}

/**
 * Events produced while scanning a rule file line by line. Joining the lines
 * of every event except `audit`, in order, gives back the input without its
 * audit comments.
 */
export type SegmentEvent =
  /** Document start marker and the comments right after it. */
  | { type: 'preamble'; lines: string[] }
  /** Annotation left by a previous run; dropped. */
  | { type: 'audit'; line: string; lineNumber: number }
  /**
   * A root sequence item starts. `lines` closes the previous record (up to its
   * last non-blank, non-comment line); `key` is that record's key.
   */
  | { type: 'boundary'; key: string | null; lines: string[]; rootIndentation: number }
  /** The current record's key is known. `leading` precedes the annotation point. */
  | { type: 'key'; key: string; leading: string[] }
  /** End of input: the last record's content, then whatever follows it. */
  | { type: 'end'; key: string | null; lines: string[]; trailing: string[] };

type SegmenterState = 'before-document' | 'in-document';

/**
 * Partition a file's raw lines into records without parsing the whole file.
 *
 * Comments and blank lines after a record are ambiguous until the next record
 * starts: they stay buffered and are handed to the next record as its leading
 * lines. Composite keys are read by parsing only the buffered lines of the
 * current record once its primary and secondary identity lines have been seen.
 */
export function* segmentLines(
  lines: Iterable<string>,
  options: SegmenterOptions,
): Generator<SegmentEvent, void, undefined> {
  const { kind, fields } = options;
  const primaryPattern = new RegExp(`^\\s*-*\\s*${escapeRegex(fields.primary)}:\\s*\\S+`);
  const secondaryPattern = new RegExp(`^\\s*${escapeRegex(fields.secondary)}:\\s*\\S+`);

  let state: SegmenterState = 'before-document';
  const preamble: string[] = [];
  let rootIndentation: number | null = null;

  const buffer: string[] = [];
  // Buffered lines up to and including the last non-blank, non-comment one.
  let contentEnd = 0;
  let currentKey: string | null = null;
  let primaryLine: number | null = null;

  let lineNumber = 0;
  for (const line of lines) {
    lineNumber++;

    if (isAuditComment(line)) {
      yield { type: 'audit', line, lineNumber };
      continue;
    }

    if (state === 'before-document') {
      if (isNormalComment(line) || isDocumentStart(line)) {
        preamble.push(line);
        continue;
      }
      state = 'in-document';
      yield { type: 'preamble', lines: preamble };
    }

    let rootItem = false;
    if (isSequenceItem(line)) {
      const indentation = indentationOf(line);
      if (rootIndentation === null) rootIndentation = indentation;

      if (indentation === rootIndentation) {
        rootItem = true;
        yield {
          type: 'boundary',
          key: currentKey,
          lines: buffer.splice(0, contentEnd),
          rootIndentation,
        };
        contentEnd = 0;
        currentKey = null;
        primaryLine = null;
      }
    }

    buffer.push(line);
    if (isContentLine(line)) contentEnd = buffer.length;

    if (rootIndentation === null || currentKey !== null) continue;

    let key: string | null = null;
    if (kind === 'single-key') {
      // Nested `- ` lines belong to the record's value, never to its key.
      if (rootItem) key = keyFromRecordLine(line);
    } else {
      if (primaryLine === null && primaryPattern.test(line)) {
        primaryLine = buffer.length - 1;
      }
      if (primaryLine !== null && secondaryPattern.test(line)) {
        key = keyFromBufferedLines(buffer, fields);
      }
    }

    if (key !== null) {
      const leadCount = kind === 'single-key' ? countLeadingBlankLines(buffer) : primaryLine ?? 0;
      const leading = buffer.splice(0, leadCount);
      contentEnd = Math.max(0, contentEnd - leadCount);
      currentKey = key;
      primaryLine = null;
      yield { type: 'key', key, leading };
    }
  }

  if (state === 'before-document') {
    yield { type: 'preamble', lines: preamble };
  }

  const lastLines = buffer.splice(0, contentEnd);
  yield { type: 'end', key: currentKey, lines: lastLines, trailing: buffer };
}

/**
 * Parse just the buffered lines of one record and derive its composite key.
 */
export function keyFromBufferedLines(buffer: string[], fields: IdentityFields): string | null {
  const doc = parseDocument(buffer.join('').replace(/\t/g, ' '), PARSE_OPTIONS);
  if (doc.errors.length > 0) return null;

  const parsed = toRecordValue(doc.toJS());
  if (parsed.kind !== 'sequence' || parsed.items.length !== 1) return null;
  return deriveRecordKey(parsed.items[0], 'composite', fields) ?? null;
}

/**
 * Key of a single-key record from its root item line. The key token is
 * decoded by the YAML parser, so `- "\\":` gives the same key as the parsed file.
 */
export function keyFromRecordLine(line: string): string | null {
  const token = keyTokenFromLine(line);
  if (token === null) return null;

  const doc = parseDocument(`- ${token}:\n`, PARSE_OPTIONS);
  if (doc.errors.length > 0) return null;

  const parsed = toRecordValue(doc.toJS());
  if (parsed.kind !== 'sequence' || parsed.items.length !== 1) return null;
  const [record] = parsed.items;
  return record.kind === 'mapping' && record.entries.length === 1 ? record.entries[0][0] : null;
}

function countLeadingBlankLines(buffer: string[]): number {
  let count = 0;
  while (count < buffer.length && isBlank(buffer[count])) count++;
  return count;
}
