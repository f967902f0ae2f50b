import { brand, color, icon, tree } from './theme.js';

/**
 * Top-level step marker: "● Text" in brand amber + bold.
 */
export function step(text: string): string {
  return `${brand.amber(icon.step)} ${color.bold(text)}`;
}

/**
 * Middle sub-step: "  ├─ text" with tertiary connector.
 */
export function substep(text: string): string {
  return `  ${color.tertiary(tree.mid)} ${text}`;
}

/**
 * Last sub-step: "  └─ text" with tertiary connector.
 */
export function lastSub(text: string): string {
  return `  ${color.tertiary(tree.last)} ${text}`;
}

/**
 * Success line with checkmark: "  └─ ✓ text" (or ├─ if not last).
 */
export function success(text: string, isLast = true): string {
  const connector = isLast ? tree.last : tree.mid;
  return `  ${color.tertiary(connector)} ${color.success(`${icon.success} ${text}`)}`;
}

export function error(text: string): string {
  return color.error(`${icon.error} ${text}`);
}

export function warn(text: string): string {
  return color.warning(`${icon.warning} ${text}`);
}

export function filePath(path: string): string {
  return color.file(path);
}

/**
 * Secondary text (zinc-400) — descriptions, metadata.
 */
export function secondary(text: string): string {
  return color.secondary(text);
}

/**
 * Tertiary text (zinc-500) — debug info.
 */
export function tertiary(text: string): string {
  return color.tertiary(text);
}

/**
 * Tree continuation pipe: "  │  text" — for multi-line content under a substep.
 */
export function treeCont(text: string): string {
  return `  ${color.tertiary(tree.pipe)}  ${text}`;
}

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Shorten paths by replacing $HOME with ~.
 */
export function shortPath(fullPath: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
  if (home && fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
