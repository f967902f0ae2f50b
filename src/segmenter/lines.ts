export const AUDIT_MARKER = '[AUDIT]';

const DOCUMENT_START_PATTERN = /^---/;
const AUDIT_COMMENT_PATTERN = /^\s*#\s*\[AUDIT\]/;
const COMMENT_PATTERN = /^\s*#/;
const SEQUENCE_ITEM_PATTERN = /^-(?:\s|$)/;

const QUOTED_DOUBLE_KEY_PATTERN = /^\s*-\s*("(?:[^"\\]|\\.)*")\s*:/;
const QUOTED_SINGLE_KEY_PATTERN = /^\s*-\s*('(?:[^']|'')*')\s*:/;
const PLAIN_KEY_PATTERN = /^\s*-\s+([^\s#'"{[][^:#]*?)\s*:(?:\s|$)/;

/** Whitespace only; trim() also covers no-break spaces. */
export function isBlank(line: string): boolean {
  return line.trim() === '';
}

export function isDocumentStart(line: string): boolean {
  return DOCUMENT_START_PATTERN.test(line.replace(/\r?\n$/, ''));
}

/** A comment line inserted by a previous audit run. */
export function isAuditComment(line: string): boolean {
  return AUDIT_COMMENT_PATTERN.test(line);
}

/** A full-line comment that is not an audit annotation. */
export function isNormalComment(line: string): boolean {
  return COMMENT_PATTERN.test(line) && !isAuditComment(line);
}

export function isContentLine(line: string): boolean {
  return !isBlank(line) && !isNormalComment(line);
}

export function indentationOf(line: string): number {
  return line.length - line.trimStart().length;
}

/** Whether the line opens a sequence item (`- ...`) at its own indentation. */
export function isSequenceItem(line: string): boolean {
  return SEQUENCE_ITEM_PATTERN.test(line.trimStart());
}

/**
 * Source text of the key on a `- key: ...` line, quotes and escapes included:
 * `"x"`, `'x'` or `x`. Decoding is left to the YAML parser.
 */
export function keyTokenFromLine(line: string): string | null {
  const match =
    line.match(QUOTED_DOUBLE_KEY_PATTERN) ??
    line.match(QUOTED_SINGLE_KEY_PATTERN) ??
    line.match(PLAIN_KEY_PATTERN);
  return match ? match[1] : null;
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Line ending used by a file: CRLF when its first line ends with one. */
export function detectLineEnding(lines: string[]): string {
  return lines.length > 0 && lines[0].endsWith('\r\n') ? '\r\n' : '\n';
}
