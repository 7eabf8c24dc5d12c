/**
 * Matching Types
 * Compiled gitignore-style pattern lists
 */

/**
 * A pattern line that was dropped while compiling
 */
export interface SkippedPattern {
  pattern: string;
  reason: string;
}

/**
 * Compiled pattern list for one ignore file
 */
export interface PatternMatcher {
  /** Pattern lines accepted by the matcher, in file order */
  readonly patterns: readonly string[];
  /** Malformed lines, never fatal */
  readonly skipped: readonly SkippedPattern[];
  /**
   * Test a path relative to the pattern's base directory.
   * Directory-only patterns (trailing "/") match only when isDirectory is true.
   */
  matches(relativePath: string, isDirectory: boolean): boolean;
}
