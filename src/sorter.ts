/**
 * Region sorters
 * Deduplicate entries, compute one sort key per entry, and stable-sort by key
 */

import { isDirectoryName } from './classifier.js';
import { extractArrayEntryName, extractBlockName } from './extractor.js';
import { compareSortKeys, naturalKey } from './natural.js';
import { ArrayName, CompareContext, SortKey } from './types.js';

/**
 * Sorted replacement for one region
 */
export interface SortedRegion {
  /** Deduplicated entries in sorted order */
  entries: string[];

  /** Exact duplicates removed */
  duplicates: number;

  /** Whether sorting changed the order of the surviving entries */
  reordered: boolean;
}

/**
 * Remove exact duplicates, keeping the first occurrence of each
 *
 * @example
 * ```typescript
 * uniq(['c', 'b', 'a', 'b', 'c']) // Returns: ['c', 'b', 'a']
 * uniq(['a ', 'a'])               // Returns: ['a ', 'a']
 * ```
 */
export function uniq(items: readonly string[]): string[] {
  return Array.from(new Set(items));
}

/**
 * Sort items by a key computed once per item
 *
 * Equal keys keep their input order.
 */
export function stableSortBy<T>(items: readonly T[], keyOf: (item: T) => SortKey): T[] {
  return items
    .map((item, index) => ({ item, index, key: keyOf(item) }))
    .sort((a, b) => compareSortKeys(a.key, b.key) || a.index - b.index)
    .map(({ item }) => item);
}

function sortUnique(
  items: readonly string[],
  keyOf: (item: string) => SortKey
): SortedRegion {
  const unique = uniq(items);
  const entries = stableSortBy(unique, keyOf);
  return {
    entries,
    duplicates: items.length - unique.length,
    reordered: entries.some((entry, i) => entry !== unique[i]),
  };
}

/**
 * Sort the entry lines of one array region
 *
 * `files` arrays order by natural name only. All other arrays put
 * directory-like names first, then order by natural name. Entries without
 * an extractable name sort under the empty name as files.
 *
 * @param entries - Raw lines between the opening line and the `);` marker
 * @param array - Array key of the region
 * @param ctx - Comparison mode
 *
 * @example
 * ```typescript
 * sortArrayEntries(
 *   [
 *     '\tBBBBBBBBBBBBBBBBBBBBBBBB /* b.m *\/,',
 *     '\tAAAAAAAAAAAAAAAAAAAAAAAA /* a.m *\/,',
 *     '\tAAAAAAAAAAAAAAAAAAAAAAAA /* a.m *\/,',
 *   ],
 *   'children',
 *   ctx
 * ).entries
 * // Returns the a.m line, then the b.m line
 * ```
 */
export function sortArrayEntries(
  entries: readonly string[],
  array: ArrayName,
  ctx: CompareContext
): SortedRegion {
  const byName = array === 'files';
  return sortUnique(entries, (line) => {
    const name = extractArrayEntryName(line, array);
    return {
      directory: !byName && isDirectoryName(name, ctx),
      name: naturalKey(name, ctx.caseInsensitive),
    };
  });
}

/**
 * A block record ready for sorting
 */
export interface RecordText {
  /** Prefix lines plus record lines, as emitted */
  text: string;

  /** Record lines only, used to extract the name */
  body: string;
}

/**
 * Sort the records of one block section
 *
 * Duplicates compare on the full text, prefix included. Ordering uses the
 * record's extracted name with the same directory precedence as arrays.
 *
 * @returns Sorted record texts
 */
export function sortBlockRecords(records: readonly RecordText[], ctx: CompareContext): SortedRegion {
  const bodies = new Map<string, string>();
  for (const record of records) {
    if (!bodies.has(record.text)) {
      bodies.set(record.text, record.body);
    }
  }

  return sortUnique(
    records.map((r) => r.text),
    (text) => {
      const name = extractBlockName(bodies.get(text) ?? text);
      return {
        directory: isDirectoryName(name, ctx),
        name: naturalKey(name, ctx.caseInsensitive),
      };
    }
  );
}
