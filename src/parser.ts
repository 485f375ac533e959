/**
 * Line-level parser for project.pbxproj documents
 * Recognizes region boundaries and rebuilds brace-balanced block records
 */

import { ArrayName, BlockSplit, BlockRecord, UnbalancedRecordError } from './types.js';

// Regex patterns for region boundaries
// Opening line of a sortable array: "<indent>children = (" and nothing else
const ARRAY_START_PATTERN =
  /^(\s*)(children|files|buildConfigurations|targets|packageProductDependencies|packageReferences)\s*=\s*\(\s*$/;
const SECTION_BEGIN_PATTERN = /Begin\s+(\S+)\s+section/;
// Record head: "<id> /* Name */ = {" (comment and brace optional; the main group has no comment)
const RECORD_START_PATTERN = /^\s*[0-9A-Fa-f]{24}(?:\s+\/\*.*?\*\/)?\s*=/;

/**
 * Section whose entry order is link-order significant
 * Never reordered, whatever the allow-list says
 */
export const PROTECTED_SECTION = 'PBXFrameworksBuildPhase';

/**
 * Classification of one line while scanning outside any region
 */
export type LineMatch =
  | { kind: 'array'; name: ArrayName; indent: string }
  | { kind: 'section'; section: string }
  | { kind: 'protected'; section: string }
  | { kind: 'line' };

/**
 * Split a document into lines on `\n`
 *
 * A `\r` before the newline stays part of its line and a trailing newline
 * yields a final empty line, so `splitLines(text).join('\n') === text`.
 */
export function splitLines(text: string): string[] {
  return text.split('\n');
}

function isArrayName(value: string): value is ArrayName {
  return (
    value === 'children' ||
    value === 'files' ||
    value === 'buildConfigurations' ||
    value === 'targets' ||
    value === 'packageProductDependencies' ||
    value === 'packageReferences'
  );
}

/**
 * Match a line that opens a sortable array
 *
 * @returns Array key and indentation, or null
 *
 * @example
 * ```typescript
 * matchArrayStart('\t\t\tchildren = (')
 * // Returns: { name: 'children', indent: '\t\t\t' }
 * matchArrayStart('\t\t\tbuildPhases = (') // Returns: null
 * ```
 */
export function matchArrayStart(line: string): { name: ArrayName; indent: string } | null {
  const match = line.match(ARRAY_START_PATTERN);
  if (!match || !isArrayName(match[2])) {
    return null;
  }
  return { name: match[2], indent: match[1] };
}

/**
 * Classify a line encountered while scanning outside any region
 *
 * Priority: array opening, protected section, any other section, plain line.
 * Whether a non-protected section is sorted or copied is decided by the
 * caller from its allow-list.
 */
export function matchLine(line: string): LineMatch {
  const array = matchArrayStart(line);
  if (array) {
    return { kind: 'array', ...array };
  }

  const section = line.match(SECTION_BEGIN_PATTERN);
  if (section) {
    const kind = section[1];
    return kind === PROTECTED_SECTION
      ? { kind: 'protected', section: kind }
      : { kind: 'section', section: kind };
  }

  return { kind: 'line' };
}

/**
 * Check whether a line closes an array opened with the given indentation
 *
 * Only the exact indent followed by `);` and optional trailing whitespace
 * matches, so arrays nested at other depths are never confused.
 */
export function isArrayEnd(line: string, indent: string): boolean {
  const marker = `${indent});`;
  return line.startsWith(marker) && line.slice(marker.length).trim() === '';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Check whether a line is the `End <section> section` marker
 */
export function isSectionEnd(line: string, section: string): boolean {
  return new RegExp(`End\\s+${escapeRegExp(section)}\\s+section`).test(line);
}

function braceBalance(line: string): number {
  let balance = 0;
  for (const ch of line) {
    if (ch === '{') balance++;
    else if (ch === '}') balance--;
  }
  return balance;
}

/**
 * Split the body of a block section into records
 *
 * A record starts at an identifier line (`<id> /* Name *\/ = ...`). Lines
 * before it that start no record become its prefix. When the identifier
 * line opens a brace, lines are added until the running count of `{`
 * minus `}` returns to zero.
 *
 * @param body - Lines strictly between the `Begin` and `End` markers
 * @param firstLine - 1-based line number of `body[0]`
 * @param section - Section kind, for error messages
 * @param maxRecordLines - Upper bound on lines in one record
 * @returns Records in input order plus any non-record lines after the last one
 * @throws {UnbalancedRecordError} When braces do not balance within the body or the line cap
 *
 * @example
 * ```typescript
 * const { records } = splitBlockRecords(
 *   [
 *     '\t\tAAAAAAAAAAAAAAAAAAAAAAAA /* Zeta *\/ = {',
 *     '\t\t\tisa = PBXGroup;',
 *     '\t\t};',
 *   ],
 *   10,
 *   'PBXGroup',
 *   10000
 * );
 * // records[0].lines.length === 3, records[0].line === 10
 * ```
 */
export function splitBlockRecords(
  body: string[],
  firstLine: number,
  section: string,
  maxRecordLines: number
): BlockSplit {
  const records: BlockRecord[] = [];
  let prefix: string[] = [];

  for (let i = 0; i < body.length; i++) {
    const line = body[i];
    if (!RECORD_START_PATTERN.test(line)) {
      prefix.push(line);
      continue;
    }

    const start = i;
    if (line.includes('{')) {
      let balance = braceBalance(line);
      while (balance > 0) {
        i++;
        if (i >= body.length || i - start >= maxRecordLines) {
          throw new UnbalancedRecordError(section, firstLine + start);
        }
        balance += braceBalance(body[i]);
      }
    }

    records.push({ prefix, lines: body.slice(start, i + 1), line: firstLine + start });
    prefix = [];
  }

  return { records, trailing: prefix };
}
