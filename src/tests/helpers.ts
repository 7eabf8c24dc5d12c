import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { FileEntry } from '../core/traversal/index.js';

// Helper to create a temporary test directory
export async function createTempTestDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `chunky-${label}-`));
}

// Helper to create a test file, creating parent directories as needed
export async function createTestFile(dir: string, path: string, content: string): Promise<void> {
  const fullPath = join(dir, path);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content, 'utf-8');
}

export async function removeTestDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

// In-memory file entry for assigner and writer tests
export function fileEntry(relativePath: string, size: number, index: number, root = '/'): FileEntry {
  return { absolutePath: join(root, relativePath), relativePath, size, index };
}
