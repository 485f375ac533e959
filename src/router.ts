/**
 * Region router
 * Walks a project document once and reassembles it with every sortable region sorted
 */

import { createCompareContext } from './classifier.js';
import { resolveSortOptions } from './config.js';
import { extractArrayEntryName } from './extractor.js';
import {
  isArrayEnd,
  isSectionEnd,
  matchArrayStart,
  matchLine,
  splitBlockRecords,
  splitLines,
} from './parser.js';
import { sortArrayEntries, sortBlockRecords } from './sorter.js';
import {
  ArrayRegion,
  CompareContext,
  RegionReport,
  SortOptions,
  SortOutcome,
  UnterminatedRegionError,
} from './types.js';

/**
 * Scanner state between lines
 *
 * - `scanning`: outside any region
 * - `array`: collecting entries until the indent-matched `);`
 * - `block`: collecting a sortable section body until its `End` line
 * - `verbatim`: copying a section through its `End` line
 */
type ScanState =
  | { kind: 'scanning' }
  | { kind: 'array'; region: ArrayRegion; entries: string[] }
  | { kind: 'block'; section: string; line: number; body: string[] }
  | { kind: 'verbatim'; section: string; line: number; protected: boolean };

/**
 * Everything one pass shares across nested scans
 */
interface Pass {
  ctx: CompareContext;
  sortableSections: ReadonlySet<string>;
  maxRecordLines: number;
  regions: RegionReport[];
}

function finishArray(state: { region: ArrayRegion; entries: string[] }, pass: Pass): string[] {
  const { region, entries } = state;
  const sorted = sortArrayEntries(entries, region.name, pass.ctx);
  pass.regions.push({
    kind: 'array',
    name: region.name,
    line: region.line,
    entries: entries.length,
    duplicates: sorted.duplicates,
    reordered: sorted.reordered,
    unnamed: sorted.entries.filter((e) => extractArrayEntryName(e, region.name) === '').length,
  });
  return sorted.entries;
}

function finishSection(
  state: { section: string; line: number; body: string[] },
  pass: Pass
): string[] {
  const { section, line, body } = state;
  const split = splitBlockRecords(body, line + 1, section, pass.maxRecordLines);

  // Arrays inside records (PBXGroup children, XCConfigurationList buildConfigurations)
  const records = split.records.map((record) => {
    const lines = scanLines(record.lines, record.line, pass, false);
    return {
      text: [...record.prefix, ...lines].join('\n'),
      body: lines.join('\n'),
    };
  });

  const sorted = sortBlockRecords(records, pass.ctx);
  pass.regions.push({
    kind: 'section',
    name: section,
    line,
    entries: records.length,
    duplicates: sorted.duplicates,
    reordered: sorted.reordered,
    unnamed: 0,
  });
  return [...sorted.entries, ...split.trailing];
}

/**
 * Scan lines and return their reassembled replacement
 *
 * @param lines - Lines to scan
 * @param firstLine - 1-based line number of `lines[0]`
 * @param pass - Shared pass state; reports are appended to it
 * @param sections - Whether section markers are recognized (false inside block records)
 * @throws {UnterminatedRegionError} When input ends inside a region
 */
function scanLines(lines: string[], firstLine: number, pass: Pass, sections: boolean): string[] {
  const output: string[] = [];
  let state: ScanState = { kind: 'scanning' };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNum = firstLine + i;

    switch (state.kind) {
      case 'scanning': {
        output.push(line);
        if (!sections) {
          const array = matchArrayStart(line);
          if (array) {
            state = { kind: 'array', region: { ...array, line: lineNum }, entries: [] };
          }
          break;
        }

        const match = matchLine(line);
        if (match.kind === 'array') {
          state = {
            kind: 'array',
            region: { name: match.name, indent: match.indent, line: lineNum },
            entries: [],
          };
        } else if (match.kind === 'protected') {
          state = { kind: 'verbatim', section: match.section, line: lineNum, protected: true };
        } else if (match.kind === 'section') {
          state = pass.sortableSections.has(match.section)
            ? { kind: 'block', section: match.section, line: lineNum, body: [] }
            : { kind: 'verbatim', section: match.section, line: lineNum, protected: false };
        }
        break;
      }

      case 'array':
        if (isArrayEnd(line, state.region.indent)) {
          output.push(...finishArray(state, pass), line);
          state = { kind: 'scanning' };
        } else {
          state.entries.push(line);
        }
        break;

      case 'block':
        if (isSectionEnd(line, state.section)) {
          output.push(...finishSection(state, pass), line);
          state = { kind: 'scanning' };
        } else {
          state.body.push(line);
        }
        break;

      case 'verbatim':
        output.push(line);
        if (isSectionEnd(line, state.section)) {
          pass.regions.push({
            kind: state.protected ? 'protected' : 'verbatim',
            name: state.section,
            line: state.line,
            entries: 0,
            duplicates: 0,
            reordered: false,
            unnamed: 0,
          });
          state = { kind: 'scanning' };
        }
        break;
    }
  }

  switch (state.kind) {
    case 'scanning':
      return output;
    case 'array':
      throw new UnterminatedRegionError(`${state.region.name} array`, state.region.line);
    case 'block':
    case 'verbatim':
      throw new UnterminatedRegionError(`${state.section} section`, state.line);
  }
}

/**
 * Sort every sortable region of a project document
 *
 * Arrays (`children`, `files`, `targets`, ...) are deduplicated and sorted.
 * Allow-listed `Begin <Kind> section` blocks have their records
 * deduplicated and sorted by name. Other sections, and always
 * PBXFrameworksBuildPhase, are copied byte-for-byte.
 *
 * @param text - Full document text
 * @param options - Sort options; omitted fields take their defaults
 * @returns Reassembled text and a report per region
 * @throws {UnterminatedRegionError} When a region never reaches its end marker
 * @throws {UnbalancedRecordError} When a block record never balances its braces
 *
 * @example
 * ```typescript
 * const { text, changed } = sortProjectText(content, { caseInsensitive: true });
 * ```
 */
export function sortProjectText(text: string, options: Partial<SortOptions> = {}): SortOutcome {
  const resolved = resolveSortOptions(options);
  const pass: Pass = {
    ctx: createCompareContext(resolved),
    sortableSections: new Set(resolved.sortableSections),
    maxRecordLines: resolved.maxRecordLines,
    regions: [],
  };

  const sorted = scanLines(splitLines(text), 1, pass, true).join('\n');
  return { text: sorted, changed: sorted !== text, regions: pass.regions };
}
