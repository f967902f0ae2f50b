import type { DiffVerdicts } from '../compare/types.js';
import { takeChain } from '../compare/verdicts.js';
import { detectLineEnding, escapeRegex } from '../segmenter/lines.js';
import { segmentLines, type SegmenterOptions } from '../segmenter/segmenter.js';
import { formatAnnotation, type Annotation, type AnnotationKind } from './annotations.js';

export type AnnotationCounts = Record<AnnotationKind, number>;

export interface RewriteResult {
  content: string;
  counts: AnnotationCounts;
  /** Audit comments from an earlier run that were dropped. */
  discardedAuditLines: number;
  /** Missing reference keys that could not be spliced in. */
  unplaced: string[];
}

/** Lines of a reference record, or [] when it cannot be found. */
export type BlockLookup = (key: string) => string[];

/**
 * Rewrite the derived file's lines with fresh audit annotations. Every original
 * line passes through unchanged; old annotations are dropped; missing reference
 * records are spliced in after the record that precedes them in the reference.
 */
export function rewriteDerived(
  lines: string[],
  verdicts: DiffVerdicts,
  lookup: BlockLookup,
  options: SegmenterOptions,
): RewriteResult {
  const eol = detectLineEnding(lines);
  const pending = new Map(verdicts.insertAfter);
  const extra = new Set(verdicts.extra);
  const differing = new Set(verdicts.differences.map((d) => d.key));
  const primaryItemPattern = new RegExp(`^\\s*-\\s*${escapeRegex(options.fields.primary)}:`);

  const out: string[] = [];
  const counts: AnnotationCounts = {
    'new-record': 0,
    'needs-translation': 0,
    'not-in-reference': 0,
    differences: 0,
  };
  const unplaced: string[] = [];
  let discardedAuditLines = 0;
  let indentation = 0;

  const annotate = (annotation: Annotation): void => {
    out.push(formatAnnotation(annotation, indentation, eol));
    counts[annotation.kind]++;
  };

  const spliceMissingAfter = (anchor: string | null): void => {
    let startOfFile = anchor === null;
    for (const missingKey of takeChain(pending, anchor)) {
      const block = lookup(missingKey);
      const blankBefore = startOfFile;
      startOfFile = false;
      if (block.length === 0) {
        unplaced.push(missingKey);
        continue;
      }

      terminateLastLine(out, eol);
      const at =
        options.kind === 'single-key'
          ? 0
          : Math.max(0, block.findIndex((line) => primaryItemPattern.test(line)));
      out.push(...block.slice(0, at));
      // Set off from the preamble.
      if (blankBefore) out.push(eol);
      annotate({ kind: 'new-record', key: missingKey });
      out.push(...block.slice(at));
      terminateLastLine(out, eol);
    }
  };

  for (const event of segmentLines(lines, options)) {
    switch (event.type) {
      case 'audit':
        discardedAuditLines++;
        break;
      case 'preamble':
        out.push(...event.lines);
        break;
      case 'boundary':
        indentation = event.rootIndentation;
        out.push(...event.lines);
        spliceMissingAfter(event.key);
        break;
      case 'key': {
        out.push(...event.leading);
        const count = verdicts.untranslated.get(event.key);
        if (count !== undefined && count > 0) {
          annotate({ kind: 'needs-translation', key: event.key, count });
        }
        if (extra.has(event.key)) {
          annotate({ kind: 'not-in-reference', key: event.key });
        }
        if (differing.has(event.key)) {
          annotate({ kind: 'differences', key: event.key });
        }
        break;
      }
      case 'end':
        out.push(...event.lines);
        spliceMissingAfter(event.key);
        out.push(...event.trailing);
        break;
    }
  }

  unplaced.push(...pending.values());

  return { content: out.join(''), counts, discardedAuditLines, unplaced };
}

export function totalAnnotations(counts: AnnotationCounts): number {
  return Object.values(counts).reduce((sum, n) => sum + n, 0);
}

/** Spliced text must start and end on its own line even at end of file. */
function terminateLastLine(out: string[], eol: string): void {
  const last = out.length - 1;
  if (last >= 0 && !out[last].endsWith('\n')) {
    out[last] += eol;
  }
}
