import ignore from 'ignore';
import { PatternError, formatError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { PatternMatcher, SkippedPattern } from './matching.types.js';

const log = createLogger('matcher');

/** Gitignore matching is case-sensitive; the engine defaults to case-insensitive */
const ENGINE_OPTIONS = { ignorecase: false };

/**
 * Splits ignore file text into pattern lines.
 *
 * Blank lines and `#` comments are dropped; `\#` escapes a literal hash and is kept.
 * Trailing whitespace is trimmed unless escaped with a backslash.
 */
export function parseIgnorePatterns(text: string): string[] {
  const patterns: string[] = [];

  for (const rawLine of text.split('\n')) {
    let line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.endsWith('\\ ')) {
      line = line.trimEnd();
    }
    if (line === '' || line.startsWith('#')) {
      continue;
    }
    patterns.push(line);
  }

  return patterns;
}

/**
 * Rejects lines that can never match anything
 */
function validatePattern(pattern: string): void {
  if (pattern.trim() === '') {
    throw new Error('pattern is empty');
  }
  if (pattern === '!' || pattern === '/') {
    throw new Error('pattern has no path component');
  }
}

/**
 * Compiles pattern lines into a matcher.
 * Each line is compiled on its own so a malformed one is skipped without
 * losing the rest of the file.
 */
export function compilePatterns(lines: readonly string[]): PatternMatcher {
  const engine = ignore(ENGINE_OPTIONS);
  const patterns: string[] = [];
  const skipped: SkippedPattern[] = [];

  for (const line of lines) {
    try {
      validatePattern(line);
      // Probe on a throwaway instance first so a bad line can't leave the engine half-updated
      ignore(ENGINE_OPTIONS).add(line).ignores('probe');
      engine.add(line);
      patterns.push(line);
    } catch (err) {
      const patternError = new PatternError(line, err);
      log.debug(patternError.message);
      skipped.push({ pattern: line, reason: patternError.message });
    }
  }

  return {
    patterns,
    skipped,
    matches(relativePath: string, isDirectory: boolean): boolean {
      if (patterns.length === 0 || relativePath === '' || relativePath === '.') {
        return false;
      }
      const candidate = isDirectory ? `${relativePath}/` : relativePath;
      try {
        return engine.ignores(candidate);
      } catch (err) {
        // Names like "..." are valid on disk but rejected by the engine
        log.debug(`Cannot match "${candidate}": ${formatError(err)}`);
        return false;
      }
    },
  };
}

/**
 * Parse and compile in one step
 */
export function compileIgnoreFile(text: string): PatternMatcher {
  return compilePatterns(parseIgnorePatterns(text));
}
