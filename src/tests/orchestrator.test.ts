import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync } from 'fs';
import { readdir, readFile, symlink } from 'fs/promises';
import { join } from 'path';
import { runChunking } from '../core/orchestration/index.js';
import { parseChunkContent } from '../core/writing/index.js';
import { UsageError } from '../utils/errors.js';
import { createTempTestDir, createTestFile, removeTestDir } from './helpers.js';

describe('Chunking Orchestrator', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir('orchestrator');
  });

  afterEach(async () => {
    await removeTestDir(testDir);
  });

  async function readChunks(outputDir: string): Promise<string[]> {
    const names = (await readdir(outputDir)).sort();
    return Promise.all(names.map((name) => readFile(join(outputDir, name), 'utf-8')));
  }

  it('should balance files by size across chunks', async () => {
    await createTestFile(testDir, 'a.txt', 'a'.repeat(10));
    await createTestFile(testDir, 'b.txt', 'b'.repeat(20));
    await createTestFile(testDir, 'c.txt', 'c'.repeat(5));

    const result = await runChunking({ rootDir: testDir, chunkCount: 2 });

    assert.strictEqual(result.ok, true);
    assert.strictEqual(result.outputDir, join(testDir, 'chunkies'));
    assert.deepStrictEqual(
      result.manifest.chunks.map((c) => c.files.map((f) => f.relativePath)),
      [['a.txt', 'c.txt'], ['b.txt']]
    );
    const [first, second] = await readChunks(result.outputDir);
    assert.deepStrictEqual(
      parseChunkContent(first).map((f) => f.relativePath),
      ['a.txt', 'c.txt']
    );
    assert.deepStrictEqual(parseChunkContent(second), [
      { relativePath: 'b.txt', content: 'b'.repeat(20) },
    ]);
  });

  it('should apply ignore files from the root', async () => {
    await createTestFile(testDir, '.chunkyignore', '*.log\n');
    await createTestFile(testDir, 'logs/debug.log', 'noise');
    await createTestFile(testDir, 'logs/report.txt', 'report');

    const result = await runChunking({ rootDir: testDir, chunkCount: 2 });

    assert.deepStrictEqual(
      result.manifest.chunks.map((c) => c.files.map((f) => f.relativePath)),
      [['logs/report.txt'], []]
    );
  });

  it('should put every file in the single chunk when N is 1, untruncated', async () => {
    const contents: Record<string, string> = {
      'a.md': '# Title\n\nBody text\n',
      'src/index.ts': 'export const x = 1;\n',
      'src/util/empty.txt': '',
      'z.json': '{"k": [1, 2, 3]}',
    };
    for (const [path, content] of Object.entries(contents)) {
      await createTestFile(testDir, path, content);
    }

    const result = await runChunking({ rootDir: testDir, chunkCount: 1 });
    const [only] = await readChunks(result.outputDir);

    assert.deepStrictEqual(
      parseChunkContent(only).map((f) => [f.relativePath, f.content]),
      Object.entries(contents)
    );
  });

  it('should write N empty chunks for an empty folder', async () => {
    const result = await runChunking({ rootDir: testDir, chunkCount: 3 });

    assert.strictEqual(result.ok, true);
    assert.deepStrictEqual((await readdir(result.outputDir)).sort(), [
      'chunk_1.txt',
      'chunk_2.txt',
      'chunk_3.txt',
    ]);
    assert.deepStrictEqual(await readChunks(result.outputDir), ['', '', '']);
  });

  it('should never pick up its own previous output', async () => {
    await createTestFile(testDir, 'a.txt', 'alpha');
    await createTestFile(testDir, 'b.txt', 'beta');

    const firstRun = await runChunking({ rootDir: testDir, chunkCount: 2 });
    const firstChunks = await readChunks(firstRun.outputDir);
    const secondRun = await runChunking({ rootDir: testDir, chunkCount: 2 });

    assert.strictEqual(secondRun.manifest.totalFiles, 2);
    assert.deepStrictEqual(await readChunks(secondRun.outputDir), firstChunks);
  });

  it('should use the configured prefix, output directory and sizes', async () => {
    await createTestFile(testDir, 'a.txt', 'alpha');

    const result = await runChunking({
      rootDir: testDir,
      chunkCount: 1,
      outputPrefix: 'part',
      outputDirName: 'out',
      includeSize: true,
    });

    assert.deepStrictEqual(await readdir(join(testDir, 'out')), ['part_1.txt']);
    assert.deepStrictEqual(result.writeResults.map((r) => r.outputPath), [
      join(testDir, 'out', 'part_1.txt'),
    ]);
    assert.strictEqual(
      await readFile(join(testDir, 'out', 'part_1.txt'), 'utf-8'),
      '<<<START: a.txt (5 bytes)>>>\nalpha\n<<<END: a.txt>>>\n\n'
    );
  });

  it('should not write anything on a dry run', async () => {
    await createTestFile(testDir, 'a.txt', 'alpha');

    const result = await runChunking({ rootDir: testDir, chunkCount: 2, dryRun: true });

    assert.strictEqual(result.ok, true);
    assert.deepStrictEqual(result.writeResults, []);
    assert.strictEqual(result.manifest.totalFiles, 1);
    assert.strictEqual(existsSync(join(testDir, 'chunkies')), false);
  });

  it('should report progress through callbacks', async () => {
    await createTestFile(testDir, 'a.txt', 'a');
    await createTestFile(testDir, 'b.txt', 'bb');
    const events: string[] = [];
    let written = 0;

    await runChunking(
      { rootDir: testDir, chunkCount: 2 },
      {
        onWalkStart: () => events.push('walk-start'),
        onFileFound: (file) => events.push(`file:${file.relativePath}`),
        onWalkComplete: (count, size) => events.push(`walk-complete:${count}:${size}`),
        onAssignmentComplete: (manifest) => events.push(`assigned:${manifest.chunkCount}`),
        onChunkWritten: () => {
          written++;
        },
      }
    );

    assert.deepStrictEqual(events, [
      'walk-start',
      'file:a.txt',
      'file:b.txt',
      'walk-complete:2:3',
      'assigned:2',
    ]);
    assert.strictEqual(written, 2);
  });

  it('should collect traversal warnings without failing', async () => {
    await createTestFile(testDir, 'a.txt', 'a');
    await symlink(join(testDir, 'nowhere'), join(testDir, 'dangling'));

    const result = await runChunking({ rootDir: testDir, chunkCount: 1 }, { onWarning: () => {} });

    assert.strictEqual(result.ok, true);
    assert.deepStrictEqual(
      result.warnings.map((w) => w.kind),
      ['broken-symlink']
    );
  });

  describe('usage errors', () => {
    it('should reject a missing folder before doing anything', async () => {
      await assert.rejects(
        runChunking({ rootDir: join(testDir, 'missing'), chunkCount: 2 }),
        (err: unknown) => err instanceof UsageError && /does not exist/.test(err.message)
      );
    });

    it('should reject a folder path that is a file', async () => {
      await createTestFile(testDir, 'file.txt', 'x');

      await assert.rejects(
        runChunking({ rootDir: join(testDir, 'file.txt'), chunkCount: 2 }),
        (err: unknown) => err instanceof UsageError && /is not a directory/.test(err.message)
      );
    });

    it('should reject non-positive chunk counts without creating output', async () => {
      await createTestFile(testDir, 'a.txt', 'a');

      for (const chunkCount of [0, -3]) {
        await assert.rejects(runChunking({ rootDir: testDir, chunkCount }), UsageError);
      }
      assert.strictEqual(existsSync(join(testDir, 'chunkies')), false);
    });

    it('should reject output directory names with path separators', async () => {
      await assert.rejects(
        runChunking({ rootDir: testDir, chunkCount: 1, outputDirName: 'a/b' }),
        UsageError
      );
    });
  });
});
