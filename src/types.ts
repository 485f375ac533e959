/**
 * Core type definitions for the project file sorter
 * Defines region shapes, sort options, reports, and error classes used throughout the system
 */

/**
 * Array keys whose entries may be reordered
 *
 * `files` entries carry a build-phase annotation and compare by name only.
 * Every other array puts directory-like entries before file-like ones.
 */
export type ArrayName =
  | 'children'
  | 'files'
  | 'buildConfigurations'
  | 'targets'
  | 'packageProductDependencies'
  | 'packageReferences';

/**
 * Parenthesized list region discovered while scanning
 *
 * @example
 * ```typescript
 * const region: ArrayRegion = { name: 'children', indent: '\t\t\t', line: 42 };
 * ```
 */
export interface ArrayRegion {
  /** Array key that opened the region */
  name: ArrayName;

  /**
   * Exact leading whitespace of the opening line
   * The region ends at a line holding this indent followed by `);`
   */
  indent: string;

  /** 1-based line number of the opening line */
  line: number;
}

/**
 * One identifier-keyed record inside a `Begin <Kind> section` block
 *
 * Comment and blank lines that precede the record travel with it.
 */
export interface BlockRecord {
  /** Lines before the record that did not start a record themselves */
  prefix: string[];

  /** Record lines, from the identifier line through the balancing brace */
  lines: string[];

  /** 1-based line number of the identifier line */
  line: number;
}

/**
 * Result of splitting a block section body into records
 */
export interface BlockSplit {
  records: BlockRecord[];

  /** Non-record lines after the last record, emitted before the `End` line */
  trailing: string[];
}

/**
 * Natural sort token: a maximal run of digits or of non-digits
 */
export type NaturalToken =
  | { kind: 'number'; value: bigint; length: number }
  | { kind: 'text'; value: string };

/**
 * Comparable key derived from a name, compared token by token
 */
export type NaturalKey = NaturalToken[];

/**
 * Precomputed ordering key for one array entry or block record
 */
export interface SortKey {
  /** Directory-like entries sort before file-like entries */
  directory: boolean;
  name: NaturalKey;
}

/**
 * Comparison mode shared by the comparator and the classifier
 *
 * Passed explicitly so that every lookup in one pass sees the same mode.
 */
export interface CompareContext {
  caseInsensitive: boolean;

  /** Extension-less names treated as files, already case-folded when insensitive */
  knownFiles: ReadonlySet<string>;
}

/**
 * Options controlling one sort pass
 */
export interface SortOptions {
  /** Case-fold natural keys and known-file lookups */
  caseInsensitive: boolean;

  /** Extension-less file names that must not be classified as directories */
  knownFiles: readonly string[];

  /** Section kinds whose records may be reordered */
  sortableSections: readonly string[];

  /** Upper bound on lines in one brace-balanced record */
  maxRecordLines: number;
}

/**
 * Region categories reported by the router
 *
 * - `array`: sorted parenthesized list
 * - `section`: sorted block section
 * - `verbatim`: section kind outside the allow-list, copied unchanged
 * - `protected`: link-order-sensitive section, copied unchanged
 */
export type RegionKind = 'array' | 'section' | 'verbatim' | 'protected';

/**
 * What happened to one region during a pass
 *
 * @example
 * ```typescript
 * const report: RegionReport = {
 *   kind: 'array',
 *   name: 'children',
 *   line: 12,
 *   entries: 4,
 *   duplicates: 1,
 *   reordered: true,
 *   unnamed: 0
 * };
 * ```
 */
export interface RegionReport {
  kind: RegionKind;

  /** Array key or section kind */
  name: string;

  /** 1-based line number of the opening line */
  line: number;

  /** Entries or records read, duplicates included */
  entries: number;

  /** Exact duplicates removed */
  duplicates: number;

  /** Whether the surviving entries changed order */
  reordered: boolean;

  /** Array entries whose name could not be extracted */
  unnamed: number;
}

/**
 * Reassembled document plus what the pass did to it
 */
export interface SortOutcome {
  text: string;

  /** True when `text` differs from the input */
  changed: boolean;

  regions: RegionReport[];
}

/**
 * Result of processing one project file
 */
export interface FileSortResult {
  /** Resolved `project.pbxproj` path */
  filePath: string;

  /** Whether the file already matched its sorted form */
  alreadySorted: boolean;

  /** Whether the file was rewritten (never in check mode) */
  written: boolean;

  regions: RegionReport[];
}

/**
 * Severity levels for project file check issues
 */
export type CheckSeverity = 'error' | 'warning';

/**
 * Single issue found while checking a project file
 *
 * @example
 * ```typescript
 * const issue: CheckIssue = {
 *   line: 15,
 *   severity: 'error',
 *   code: 'UNSORTED_ARRAY',
 *   message: 'children array is not sorted'
 * };
 * ```
 */
export interface CheckIssue {
  /** Line number where issue was detected (1-based) */
  line: number;

  /** Severity level: error (file is not canonical) or warning (informational) */
  severity: CheckSeverity;

  /** Machine-readable error code for programmatic handling */
  code: string;

  /** Human-readable description of the issue */
  message: string;
}

/**
 * Result of a project file check
 *
 * A file passes when errors is 0, i.e. sorting it would change nothing.
 */
export interface CheckResult {
  /** True when no errors found (warnings allowed) */
  valid: boolean;

  /** Count of error-level issues */
  errors: number;

  /** Count of warning-level issues */
  warnings: number;

  /** All issues found during check */
  issues: CheckIssue[];
}

/**
 * Configuration error exception
 *
 * Thrown when a configuration file is missing, malformed, or contains
 * invalid values, including an attempt to make a protected section sortable.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Configuration file not found: ./pbxsort.json');
 * ```
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Path does not name a `project.pbxproj` file
 *
 * Recoverable: batch drivers warn and move on to the next path.
 */
export class NotATargetFileError extends Error {
  constructor(public readonly filePath: string) {
    super(`Not an Xcode project file: ${filePath}`);
    this.name = 'NotATargetFileError';
    Object.setPrototypeOf(this, NotATargetFileError.prototype);
  }
}

/**
 * An array or section never reached its end marker
 *
 * Fatal for the file being processed: nothing is written for it.
 */
export class UnterminatedRegionError extends Error {
  constructor(
    public readonly region: string,
    public readonly line: number
  ) {
    super(`Unexpected end of file while parsing ${region} opened at line ${line}`);
    this.name = 'UnterminatedRegionError';
    Object.setPrototypeOf(this, UnterminatedRegionError.prototype);
  }
}

/**
 * A multi-line block record never balanced its braces
 *
 * Fatal for the file being processed: nothing is written for it.
 */
export class UnbalancedRecordError extends Error {
  constructor(
    public readonly section: string,
    public readonly line: number
  ) {
    super(`Unbalanced braces in ${section} record starting at line ${line}`);
    this.name = 'UnbalancedRecordError';
    Object.setPrototypeOf(this, UnbalancedRecordError.prototype);
  }
}

/**
 * Reading or rewriting a project file failed
 *
 * The original error is kept as `cause`.
 */
export class ProjectIOError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ProjectIOError';
    Object.setPrototypeOf(this, ProjectIOError.prototype);
  }
}

/**
 * Invalid command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}
