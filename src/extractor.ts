/**
 * Display-name extraction for array entries and block records
 * Names drive ordering; entries themselves are compared as opaque text
 */

import { ArrayName } from './types.js';

// Entry in children/targets/buildConfigurations/...: ID /* Name */,
const ARRAY_ENTRY_PATTERN = /^\s*[0-9A-Fa-f]{24}\s+\/\*\s*(.+?)\s*\*\/,\s*$/;

// Entry in files: ID /* Name in Sources */, (or ID /* Name */ in Sources)
// The build-phase annotation after " in " is never part of the name
const FILES_ENTRY_PATTERN = /^\s*[0-9A-Fa-f]{24}\s+\/\*\s*(.+?)(?:\s*\*\/)?\s+in\s+/;

// Record head: ID /* Name */ =
const RECORD_COMMENT_PATTERN = /^\s*[0-9A-Fa-f]{24}\s+\/\*\s*(.+?)\s*\*\/\s*=/m;
const RECORD_NAME_PATTERN = /\bname\s*=\s*(?:"(.*?)"|([^";\s]+)\s*;)/m;
const RECORD_PATH_PATTERN = /\bpath\s*=\s*(?:"(.*?)"|([^";\s]+)\s*;)/m;
const FIRST_CONTENT_LINE_PATTERN = /^\s*(\S.*)$/m;

/**
 * Extract the comparison name of one array entry line
 *
 * `files` arrays stop the name before the ` in <Phase>` annotation; all
 * other arrays take the whole comment before the trailing comma.
 *
 * @param line - Raw entry line
 * @param array - Array key the entry belongs to
 * @returns Extracted name, or empty string when the line has no recognizable comment
 *
 * @example
 * ```typescript
 * extractArrayEntryName('\t\tAABBCCDD00112233EEFF4455 /* Models *\/,', 'children')
 * // Returns: 'Models'
 * extractArrayEntryName('\t\tAABBCCDD00112233EEFF4455 /* main.m in Sources *\/,', 'files')
 * // Returns: 'main.m'
 * ```
 */
export function extractArrayEntryName(line: string, array: ArrayName): string {
  const pattern = array === 'files' ? FILES_ENTRY_PATTERN : ARRAY_ENTRY_PATTERN;
  const match = line.match(pattern);
  return match ? match[1] : '';
}

function firstCapture(match: RegExpMatchArray | null): string | null {
  if (!match) {
    return null;
  }
  return match[1] ?? match[2] ?? null;
}

/**
 * Extract the comparison name of a block record
 *
 * Fallback chain:
 * 1. `/* Name *\/` after the object identifier, right before `=`
 * 2. `name = "..."` (or unquoted `name = Value;`)
 * 3. `path = "..."` (or unquoted)
 * 4. first non-blank line, trimmed
 * 5. the whole record text
 *
 * @param record - Record text without its prefix lines
 * @returns Name used for ordering; never throws
 */
export function extractBlockName(record: string): string {
  const comment = record.match(RECORD_COMMENT_PATTERN);
  if (comment) {
    return comment[1];
  }

  const name = firstCapture(record.match(RECORD_NAME_PATTERN));
  if (name !== null) {
    return name;
  }

  const filePath = firstCapture(record.match(RECORD_PATH_PATTERN));
  if (filePath !== null) {
    return filePath;
  }

  const firstLine = record.match(FIRST_CONTENT_LINE_PATTERN);
  if (firstLine) {
    return firstLine[1].trim();
  }

  return record;
}
