/**
 * Ignore Module
 * Per-directory ignore rule layering and built-in exclusions
 */

export {
  createBuiltinRuleSet,
  loadDirectoryRuleSet,
  isExcluded,
  extendChain,
  toRuleRelativePath,
} from './resolver.js';
export type { IgnoreRuleSet, IgnoreRuleChain, BuiltinRuleOptions } from './ignore.types.js';
