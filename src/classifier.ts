/**
 * Directory/file classification of entry names
 */

import { CompareContext, SortOptions } from './types.js';

// A dot followed by at least one non-dot character at the end of the name
const EXTENSION_PATTERN = /\.[^.]+$/;

/**
 * Build the comparison context for one sort pass
 *
 * Known-file names are folded once here so lookups stay consistent with
 * the natural key's case mode.
 */
export function createCompareContext(
  options: Pick<SortOptions, 'caseInsensitive' | 'knownFiles'>
): CompareContext {
  const { caseInsensitive, knownFiles } = options;
  return {
    caseInsensitive,
    knownFiles: new Set(caseInsensitive ? knownFiles.map((f) => f.toLowerCase()) : knownFiles),
  };
}

/**
 * Decide whether a name denotes a directory-like entry (group, folder)
 *
 * Names with an extension are files. Names without one are directories
 * unless listed as known extension-less files. The empty name, produced
 * when extraction fails, counts as a file.
 *
 * @example
 * ```typescript
 * const ctx = createCompareContext({ caseInsensitive: false, knownFiles: ['create_hash_table'] });
 * isDirectoryName('Models', ctx)            // true
 * isDirectoryName('AppDelegate.m', ctx)     // false
 * isDirectoryName('create_hash_table', ctx) // false
 * ```
 */
export function isDirectoryName(name: string, ctx: CompareContext): boolean {
  if (name === '') {
    return false;
  }
  const folded = ctx.caseInsensitive ? name.toLowerCase() : name;
  if (EXTENSION_PATTERN.test(folded)) {
    return false;
  }
  return !ctx.knownFiles.has(folded);
}
