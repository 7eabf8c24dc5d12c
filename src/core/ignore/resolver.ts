import { readFile } from 'fs/promises';
import { join, relative, sep, isAbsolute } from 'path';
import { compileIgnoreFile, compilePatterns } from '../matching/index.js';
import { BUILTIN_RULE_SOURCE } from '../../utils/constants.js';
import { errorCode } from '../../utils/errors.js';
import type { BuiltinRuleOptions, IgnoreRuleChain, IgnoreRuleSet } from './ignore.types.js';

/**
 * Escapes gitignore metacharacters so a literal name only matches itself
 */
function escapeLiteral(name: string): string {
  const escaped = name.replace(/[*?[]/g, (ch) => `\\${ch}`);
  return /^[#!]/.test(escaped) ? `\\${escaped}` : escaped;
}

/**
 * Builds the implicit top-level layer: the tool's own output directory and
 * ignore files are never treated as data, whatever the user's rules say.
 */
export function createBuiltinRuleSet(root: string, options: BuiltinRuleOptions): IgnoreRuleSet {
  const patterns = [
    `${escapeLiteral(options.outputDirName)}/`,
    escapeLiteral(options.ignoreFileName),
    ...(options.extraPatterns ?? []),
  ];

  return {
    baseDir: root,
    source: BUILTIN_RULE_SOURCE,
    matcher: compilePatterns(patterns),
  };
}

/**
 * Loads the ignore file declared in `dir`, if any.
 *
 * @returns null when the directory has no ignore file
 * @throws the underlying read error for anything other than a missing file
 */
export async function loadDirectoryRuleSet(
  dir: string,
  ignoreFileName: string
): Promise<IgnoreRuleSet | null> {
  const source = join(dir, ignoreFileName);

  let text: string;
  try {
    text = await readFile(source, 'utf-8');
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR') {
      return null;
    }
    throw err;
  }

  return { baseDir: dir, source, matcher: compileIgnoreFile(text) };
}

/**
 * Path of `target` relative to `baseDir` in POSIX form, or null when
 * `target` is not inside `baseDir`.
 */
export function toRuleRelativePath(baseDir: string, target: string): string | null {
  const rel = relative(baseDir, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return sep === '/' ? rel : rel.split(sep).join('/');
}

/**
 * Whether a candidate is excluded by any layer of the chain.
 * Every applicable layer is consulted; there is no override between layers.
 */
export function isExcluded(
  chain: IgnoreRuleChain,
  absolutePath: string,
  isDirectory: boolean
): boolean {
  return chain.some((ruleSet) => {
    const rel = toRuleRelativePath(ruleSet.baseDir, absolutePath);
    return rel !== null && ruleSet.matcher.matches(rel, isDirectory);
  });
}

/**
 * Returns the chain to use below a directory
 */
export function extendChain(
  chain: IgnoreRuleChain,
  ruleSet: IgnoreRuleSet | null
): IgnoreRuleChain {
  return ruleSet ? [...chain, ruleSet] : chain;
}
