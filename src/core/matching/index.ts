/**
 * Matching Module
 * Gitignore-style pattern compilation and path matching
 */

export { parseIgnorePatterns, compilePatterns, compileIgnoreFile } from './matcher.js';
export type { PatternMatcher, SkippedPattern } from './matching.types.js';
