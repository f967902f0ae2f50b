import { segmentLines, type SegmenterOptions } from './segmenter.js';

/**
 * Pull one record's raw text out of a file: its leading comments and blank
 * lines plus its own lines, without the trailing comments that belong to the
 * next record. Returns [] when the key is not found.
 */
export function extractRecordLines(
  key: string,
  lines: Iterable<string>,
  options: SegmenterOptions,
): string[] {
  let leading: string[] | null = null;

  for (const event of segmentLines(lines, options)) {
    if (event.type === 'key' && event.key === key && leading === null) {
      leading = event.leading;
    } else if ((event.type === 'boundary' || event.type === 'end') && event.key === key && leading !== null) {
      // The record after the target has started (or input ended): stop scanning.
      return [...leading, ...event.lines];
    }
  }

  return [];
}

/**
 * Extract every record's block in a single pass. The first occurrence of a key wins.
 */
export function indexRecordBlocks(
  lines: Iterable<string>,
  options: SegmenterOptions,
): Map<string, string[]> {
  const blocks = new Map<string, string[]>();
  let leading: string[] = [];

  for (const event of segmentLines(lines, options)) {
    if (event.type === 'key') {
      leading = event.leading;
    } else if (event.type === 'boundary' || event.type === 'end') {
      if (event.key !== null && !blocks.has(event.key)) {
        blocks.set(event.key, [...leading, ...event.lines]);
      }
      leading = [];
    }
  }

  return blocks;
}
