/**
 * Natural ordering for entry names
 * Numeric runs compare by value so "file2" sorts before "file10"
 */

import { NaturalKey, NaturalToken, SortKey } from './types.js';

// Maximal runs of digits or of non-digits
const TOKEN_PATTERN = /\d+|\D+/g;
const DIGIT_RUN_PATTERN = /^\d/;

/**
 * Split a name into digit and non-digit runs, preserving order
 *
 * @example
 * ```typescript
 * tokenize('abc123def45') // Returns: ['abc', '123', 'def', '45']
 * tokenize('')            // Returns: []
 * ```
 */
export function tokenize(name: string): string[] {
  return name.match(TOKEN_PATTERN) ?? [];
}

/**
 * Build the natural sort key for a name
 *
 * Digit runs become unbounded integers that remember their textual length,
 * so leading zeros can break ties. Text runs are lower-cased when
 * case-insensitive.
 *
 * @param name - Display name extracted from an entry
 * @param caseInsensitive - Fold text runs to lower case
 * @returns Token list for {@link compareNaturalKeys}
 */
export function naturalKey(name: string, caseInsensitive = false): NaturalKey {
  return tokenize(name).map((token): NaturalToken => {
    if (DIGIT_RUN_PATTERN.test(token)) {
      return { kind: 'number', value: BigInt(token), length: token.length };
    }
    return { kind: 'text', value: caseInsensitive ? token.toLowerCase() : token };
  });
}

/**
 * Compare strings by Unicode code point rather than UTF-16 code unit
 *
 * Differs from `<` only where an astral character meets U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
    // Equal code points span the same number of code units
    i += left > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

function compareTokens(a: NaturalToken, b: NaturalToken): number {
  if (a.kind === 'number' && b.kind === 'number') {
    if (a.value !== b.value) {
      return a.value < b.value ? -1 : 1;
    }
    // "1" < "01" < "001"
    return a.length - b.length;
  }
  if (a.kind === 'number') {
    return -1;
  }
  if (b.kind === 'number') {
    return 1;
  }
  return compareCodePoints(a.value, b.value);
}

/**
 * Compare two natural keys token by token
 *
 * When every shared token is equal, the key with fewer tokens sorts first
 * ("file" before "file2").
 *
 * @returns Negative, zero, or positive like any sort comparator
 *
 * @example
 * ```typescript
 * compareNaturalKeys(naturalKey('file2'), naturalKey('file10')) // < 0
 * compareNaturalKeys(naturalKey('File', true), naturalKey('file', true)) // 0
 * ```
 */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const result = compareTokens(a[i], b[i]);
    if (result !== 0) {
      return result;
    }
  }
  return a.length - b.length;
}

/**
 * Compare full sort keys: directories first, then natural name order
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a.directory !== b.directory) {
    return a.directory ? -1 : 1;
  }
  return compareNaturalKeys(a.name, b.name);
}
