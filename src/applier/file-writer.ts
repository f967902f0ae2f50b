import { constants } from 'node:fs';
import { access, copyFile, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';

export interface WriteResult {
  success: boolean;
  action: 'replaced' | 'unchanged';
  filePath: string;
  backupPath: string | null;
  error?: string;
}

/**
 * Replace a file with new content, keeping a numbered backup of the original.
 * Uses atomic writes (temp file + rename), so readers see either the old
 * file or the new one.
 */
export async function replaceWithBackup(
  filePath: string,
  content: string,
  encoding: BufferEncoding,
): Promise<WriteResult> {
  if (!(await exists(filePath))) {
    return {
      success: false,
      action: 'unchanged',
      filePath,
      backupPath: null,
      error: `File not found: ${filePath}`,
    };
  }

  const backupPath = await backupFile(filePath);
  await atomicWrite(filePath, content, encoding);

  return { success: true, action: 'replaced', filePath, backupPath };
}

/**
 * First free backup name: `<file>.bak`, then `<file>-2.bak`, `<file>-3.bak`, ...
 */
export async function nextBackupPath(filePath: string): Promise<string> {
  let candidate = `${filePath}.bak`;
  let counter = 2;
  while (await exists(candidate)) {
    candidate = `${filePath}-${counter}.bak`;
    counter++;
  }
  return candidate;
}

/**
 * Copy the original next to itself. COPYFILE_EXCL keeps an existing backup intact.
 */
async function backupFile(filePath: string): Promise<string> {
  const backupPath = await nextBackupPath(filePath);
  await copyFile(filePath, backupPath, constants.COPYFILE_EXCL);
  return backupPath;
}

/**
 * Atomically write a file using temp file + rename. The temp file sits in the
 * target's directory so the rename never crosses filesystems.
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  encoding: BufferEncoding,
): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(dir, `.${basename(filePath)}.tmp-${uuidv4()}`);
  try {
    await writeFile(tempPath, content, encoding);
    await rename(tempPath, filePath);
  } catch (err: unknown) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
