/**
 * Project file checker
 * Reports which regions sorting would change, without writing anything
 */

import { readProjectFile } from './project.js';
import { sortProjectText } from './router.js';
import {
  CheckIssue,
  CheckResult,
  RegionReport,
  SortOptions,
  UnbalancedRecordError,
  UnterminatedRegionError,
} from './types.js';

function describeRegion(region: RegionReport): string {
  return region.kind === 'array' ? `${region.name} array` : `${region.name} section`;
}

function regionIssues(region: RegionReport): CheckIssue[] {
  const issues: CheckIssue[] = [];

  if (region.reordered) {
    issues.push({
      line: region.line,
      severity: 'error',
      code: region.kind === 'array' ? 'UNSORTED_ARRAY' : 'UNSORTED_SECTION',
      message: `${describeRegion(region)} is not sorted`,
    });
  }

  if (region.duplicates > 0) {
    issues.push({
      line: region.line,
      severity: 'error',
      code: 'DUPLICATE_ENTRIES',
      message: `${describeRegion(region)} contains ${region.duplicates} duplicate entr${region.duplicates === 1 ? 'y' : 'ies'}`,
    });
  }

  if (region.unnamed > 0) {
    issues.push({
      line: region.line,
      severity: 'warning',
      code: 'UNNAMED_ENTRIES',
      message: `${describeRegion(region)} has ${region.unnamed} entr${region.unnamed === 1 ? 'y' : 'ies'} without a /* name */ comment, sorted under an empty name`,
    });
  }

  return issues;
}

function summarize(issues: CheckIssue[], sorted: boolean): CheckResult {
  issues.sort((a, b) => a.line - b.line);
  const errors = issues.filter((i) => i.severity === 'error').length;
  const warnings = issues.filter((i) => i.severity === 'warning').length;
  return { valid: sorted && errors === 0, errors, warnings, issues };
}

/**
 * Build a check result from the region reports of a sort pass
 *
 * @param regions - Reports from {@link sortProjectText} or a file sort
 * @param sorted - Whether the sorted text equals the input
 */
export function summarizeRegions(regions: RegionReport[], sorted: boolean): CheckResult {
  return summarize(regions.flatMap(regionIssues), sorted);
}

/**
 * Check project file content
 *
 * Runs a full sort pass in memory and turns each region that would change
 * into an issue. Fatal format errors become a single error issue instead
 * of propagating.
 *
 * @param content - Project file content
 * @param options - Sort options; omitted fields take their defaults
 * @returns Check result; `valid` means sorting would change nothing
 *
 * @example
 * ```typescript
 * const result = checkProjectContent(content);
 * if (!result.valid) {
 *   console.error(formatCheckResult(result, 'project.pbxproj'));
 * }
 * ```
 */
export function checkProjectContent(
  content: string,
  options: Partial<SortOptions> = {}
): CheckResult {
  try {
    const outcome = sortProjectText(content, options);
    return summarizeRegions(outcome.regions, !outcome.changed);
  } catch (error) {
    if (error instanceof UnterminatedRegionError) {
      return summarize(
        [{ line: error.line, severity: 'error', code: 'UNTERMINATED_REGION', message: error.message }],
        false
      );
    }
    if (error instanceof UnbalancedRecordError) {
      return summarize(
        [{ line: error.line, severity: 'error', code: 'UNBALANCED_RECORD', message: error.message }],
        false
      );
    }
    throw error;
  }
}

/**
 * Check a project file on disk
 *
 * @param filePath - Path to a project.pbxproj file
 * @param options - Sort options; omitted fields take their defaults
 * @throws {ProjectIOError} When the file cannot be read or is not valid UTF-8
 */
export function checkProjectFile(filePath: string, options: Partial<SortOptions> = {}): CheckResult {
  return checkProjectContent(readProjectFile(filePath), options);
}

const UNSORTED_CODES = new Set(['UNSORTED_ARRAY', 'UNSORTED_SECTION']);
const FORMAT_ERROR_CODES = new Set(['UNTERMINATED_REGION', 'UNBALANCED_RECORD']);

function statusOf(result: CheckResult): string {
  if (result.issues.some((issue) => FORMAT_ERROR_CODES.has(issue.code))) {
    return 'cannot be sorted';
  }
  return result.valid ? 'sorted, with warnings' : 'not sorted';
}

/**
 * Format check result for human-readable output
 *
 * The header gives the file's status and the last line counts unsorted
 * regions alongside errors and warnings.
 *
 * @param result - Check result to format
 * @param filePath - File path for display
 * @returns Formatted string with all issues
 */
export function formatCheckResult(result: CheckResult, filePath: string): string {
  if (result.valid && result.warnings === 0) {
    return `✓ ${filePath}: OK`;
  }

  const unsorted = result.issues.filter((issue) => UNSORTED_CODES.has(issue.code)).length;
  const lines = [`${result.valid ? '⚠' : '✗'} ${filePath}: ${statusOf(result)}`];

  for (const issue of result.issues) {
    const icon = issue.severity === 'error' ? '  ✗' : '  ⚠';
    lines.push(`${icon} Line ${issue.line}: [${issue.code}] ${issue.message}`);
  }

  lines.push('');
  lines.push(
    `  ${unsorted} unsorted region(s), ${result.errors} error(s), ${result.warnings} warning(s)`
  );

  return lines.join('\n');
}
