import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseChunkContent } from '../core/writing/index.js';

describe('Chunk Reader', () => {
  it('should recover every embedded file', () => {
    const text =
      '<<<START: a.txt>>>\nalpha\n<<<END: a.txt>>>\n\n' +
      '<<<START: b/c.txt>>>\nline one\nline two\n\n<<<END: b/c.txt>>>\n\n';

    assert.deepStrictEqual(parseChunkContent(text), [
      { relativePath: 'a.txt', content: 'alpha' },
      { relativePath: 'b/c.txt', content: 'line one\nline two\n' },
    ]);
  });

  it('should read sizes from sized markers', () => {
    const text = '<<<START: a.txt (5 bytes)>>>\nalpha\n<<<END: a.txt>>>\n\n';

    assert.deepStrictEqual(parseChunkContent(text), [
      { relativePath: 'a.txt', size: 5, content: 'alpha' },
    ]);
  });

  it('should use the recorded size to skip end markers inside content', () => {
    const content = 'before\n<<<END: a.txt>>>\nafter';
    const size = Buffer.byteLength(content);
    const text = `<<<START: a.txt (${size} bytes)>>>\n${content}\n<<<END: a.txt>>>\n\n`;

    assert.deepStrictEqual(parseChunkContent(text), [{ relativePath: 'a.txt', size, content }]);
  });

  it('should fall back to the first end marker when the size does not match', () => {
    const text = '<<<START: a.txt (5 bytes)>>>\n[Error reading file: gone]\n\n<<<END: a.txt>>>\n\n';

    assert.deepStrictEqual(parseChunkContent(text), [
      { relativePath: 'a.txt', size: 5, content: '[Error reading file: gone]\n' },
    ]);
  });

  it('should keep paths that only look like sized markers', () => {
    const text = '<<<START: x (3 bytes)>>>\nabc\n<<<END: x (3 bytes)>>>\n\n';

    assert.deepStrictEqual(parseChunkContent(text), [
      { relativePath: 'x (3 bytes)', content: 'abc' },
    ]);
  });

  it('should handle empty files', () => {
    const text = '<<<START: empty.txt>>>\n\n<<<END: empty.txt>>>\n\n';

    assert.deepStrictEqual(parseChunkContent(text), [{ relativePath: 'empty.txt', content: '' }]);
  });

  it('should return nothing for an empty chunk', () => {
    assert.deepStrictEqual(parseChunkContent(''), []);
  });

  it('should reject text without a start marker', () => {
    assert.throws(() => parseChunkContent('stray text'), /expected start marker at offset 0/);
  });

  it('should reject a file with no end marker', () => {
    assert.throws(
      () => parseChunkContent('<<<START: a.txt>>>\nalpha'),
      /missing end marker for "a.txt"/
    );
  });
});
