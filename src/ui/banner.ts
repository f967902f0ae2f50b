import { brand, color, box } from './theme.js';
import { shortPath } from './format.js';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const { version: VERSION } = require('../../package.json') as { version: string };

export { VERSION };

// Strip ANSI escape codes for width calculation.
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Build the startup banner as an array of lines.
 *
 * Example output:
 *   ╭─── rule-audit v0.3.0 · Warnings ─────────────────────────╮
 *   │                                                          │
 *   │  English: ~/rules/en/general.yaml                        │
 *   │  Translated: ~/rules/fr/general.yaml                     │
 *   │                                                          │
 *   ╰──────────────────────────────────────────────────────────╯
 */
export function buildBanner(
  commandLabel: string,
  files?: { reference: string; derived: string },
): string[] {
  const titlePlain = `rule-audit v${VERSION} · ${commandLabel}`;

  const contentLines: string[] = [];
  if (files) {
    contentLines.push(`${color.secondary('English:')} ${color.file(shortPath(files.reference))}`);
    contentLines.push(`${color.secondary('Translated:')} ${color.file(shortPath(files.derived))}`);
  }

  const titleWidth = titlePlain.length + 5; // "─── " prefix (4) + trailing " " (1)
  const contentWidths = contentLines.map((l) => stripAnsi(l).length + 2);
  const minWidth = 60;
  const innerWidth = Math.max(minWidth, titleWidth + 4, ...contentWidths);

  const lines: string[] = [];

  const titlePadCount = Math.max(0, innerWidth - titleWidth);
  lines.push(
    color.tertiary(box.tl + box.h.repeat(3) + ' ') +
    brand.amber(`rule-audit v${VERSION}`) +
    color.tertiary(` · `) +
    color.bold(commandLabel) +
    color.tertiary(' ' + box.h.repeat(titlePadCount) + box.tr),
  );

  const emptyRow = color.tertiary(box.v) + ' '.repeat(innerWidth) + color.tertiary(box.v);
  if (contentLines.length > 0) {
    lines.push(emptyRow);
    for (const line of contentLines) {
      const visibleLen = stripAnsi(line).length;
      const pad = Math.max(0, innerWidth - visibleLen - 2);
      lines.push(
        color.tertiary(box.v) + `  ${line}${' '.repeat(pad)}` + color.tertiary(box.v),
      );
    }
    lines.push(emptyRow);
  }

  lines.push(color.tertiary(box.bl + box.h.repeat(innerWidth) + box.br));

  return lines;
}
