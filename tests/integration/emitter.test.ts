/**
 * File tree writer tests
 * Verifies generated files land under the output directory and nowhere else
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  createScratchDirectory,
  resolveOutputPath,
  SCRATCH_PREFIX,
  writeFileTree,
} from '../../src/lib/emitter/index.js';
import { FileIOError } from '../../src/utils/errors.js';

describe('File tree writer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'emitter-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write nested files and report their size', async () => {
    const output = new Map([
      ['package.json', '{}\n'],
      ['src/models/Customer.ts', 'export {};\n'],
    ]);

    const result = await writeFileTree(output, dir);

    expect(result.directory).toBe(resolve(dir));
    expect(result.files).toEqual([
      join(resolve(dir), 'package.json'),
      join(resolve(dir), 'src/models/Customer.ts'),
    ]);
    expect(result.bytes).toBe(3 + 11);
    expect(await readFile(join(dir, 'src/models/Customer.ts'), 'utf-8')).toBe('export {};\n');
  });

  it('should write nothing when any path escapes the directory', async () => {
    const output = new Map([
      ['README.md', '# ok\n'],
      ['../outside.txt', 'nope'],
    ]);

    await expect(writeFileTree(output, dir)).rejects.toThrow(
      'Refusing to write outside the output directory: ../outside.txt',
    );
    await expect(stat(join(dir, 'README.md'))).rejects.toThrow();
  });

  it('should reject empty, absolute and parent paths', () => {
    expect(() => resolveOutputPath(dir, '')).toThrow(FileIOError);
    expect(() => resolveOutputPath(dir, '/etc/passwd')).toThrow(FileIOError);
    expect(() => resolveOutputPath(dir, 'src/../../x.ts')).toThrow(FileIOError);
    expect(resolveOutputPath(dir, 'src/app.ts')).toBe(join(dir, 'src/app.ts'));
  });

  it('should allocate a fresh scratch directory each time', async () => {
    const first = await createScratchDirectory();
    const second = await createScratchDirectory();
    try {
      expect(first).not.toBe(second);
      expect(first.startsWith(join(tmpdir(), SCRATCH_PREFIX))).toBe(true);
      expect((await stat(first)).isDirectory()).toBe(true);
    } finally {
      await rm(first, { recursive: true, force: true });
      await rm(second, { recursive: true, force: true });
    }
  });
});
