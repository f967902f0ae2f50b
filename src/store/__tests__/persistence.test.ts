import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readJson } from '../persistence.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'persistence-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// readJson
// ---------------------------------------------------------------------------

describe('readJson', () => {
  it('returns null for non-existent file', async () => {
    const result = await readJson(join(tempDir, 'does-not-exist.json'));
    expect(result).toBeNull();
  });

  it('returns null for malformed JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{ not valid json !!!', 'utf-8');

    const result = await readJson(filePath);
    expect(result).toBeNull();
  });

  it('parses valid JSON correctly', async () => {
    const filePath = join(tempDir, 'good.json');
    const data = { ignoredFields: ['t', 'T'], identityFields: { primary: 'name' } };
    await writeFile(filePath, JSON.stringify(data), 'utf-8');

    const result = await readJson<typeof data>(filePath);
    expect(result).toEqual(data);
  });
});
