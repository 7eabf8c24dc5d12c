import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CONFIG, getEnvBoolean, getEnvNumber, loadConfig } from '../lib/config.js';

describe('Configuration', () => {
  it('should fall back to defaults for an empty environment', () => {
    assert.deepStrictEqual(loadConfig({}), {
      chunks: 2,
      outputPrefix: 'chunk',
      outputDir: 'chunkies',
      ignoreFile: '.chunkyignore',
      includeSize: false,
      debug: false,
    });
  });

  it('should read overrides from the environment', () => {
    const loaded = loadConfig({
      CHUNKY_CHUNKS: '4',
      CHUNKY_OUTPUT_PREFIX: 'part',
      CHUNKY_OUTPUT_DIR: 'out',
      CHUNKY_IGNORE_FILE: '.skip',
      CHUNKY_INCLUDE_SIZE: 'TRUE',
      CHUNKY_DEBUG: 'false',
    });

    assert.deepStrictEqual(loaded, {
      chunks: 4,
      outputPrefix: 'part',
      outputDir: 'out',
      ignoreFile: '.skip',
      includeSize: true,
      debug: false,
    });
  });

  it('should treat empty values as unset', () => {
    assert.strictEqual(loadConfig({ CHUNKY_OUTPUT_PREFIX: '' }).outputPrefix, DEFAULT_CONFIG.outputPrefix);
  });

  it('should ignore unparseable numbers', () => {
    assert.strictEqual(getEnvNumber({ N: 'many' }, 'N', 2), 2);
    assert.strictEqual(getEnvNumber({ N: '7' }, 'N', 2), 7);
  });

  it('should only accept "true" as a true boolean', () => {
    assert.strictEqual(getEnvBoolean({ B: 'yes' }, 'B', true), false);
    assert.strictEqual(getEnvBoolean({ B: 'True' }, 'B', false), true);
    assert.strictEqual(getEnvBoolean({}, 'B', true), true);
  });
});
