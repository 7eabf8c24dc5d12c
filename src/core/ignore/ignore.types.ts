/**
 * Ignore Types
 * Layered per-directory rule sets
 */

import type { PatternMatcher } from '../matching/index.js';

/**
 * One layer of ignore rules, anchored at the directory that declared it
 */
export interface IgnoreRuleSet {
  /** Absolute directory the patterns are relative to */
  readonly baseDir: string;
  /** Ignore file path, or the built-in marker */
  readonly source: string;
  readonly matcher: PatternMatcher;
}

/**
 * Rule layers from the root down to the directory being visited.
 * Purely additive: a match in any layer excludes the candidate.
 */
export type IgnoreRuleChain = readonly IgnoreRuleSet[];

export interface BuiltinRuleOptions {
  /** Output directory name, excluded as a directory at every depth */
  outputDirName: string;
  /** Ignore file name, excluded as a file at every depth */
  ignoreFileName: string;
  /** Additional root-level patterns (e.g. from the command line) */
  extraPatterns?: readonly string[];
}
