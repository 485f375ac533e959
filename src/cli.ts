#!/usr/bin/env node
/**
 * Command-line sorter for Xcode project files
 *
 * Modes:
 *   File mode:  pbxsort <project.pbxproj | App.xcodeproj | dir>... [options]
 *   Stdin mode: pbxsort - [options]
 *
 * Output:
 *   File mode: Rewrites each file in place (or only reports, with --check)
 *   Stdin mode: Writes the sorted document to stdout
 */

import * as fs from 'fs';
import * as path from 'path';
import { formatCheckResult, summarizeRegions } from './checker.js';
import { loadConfig, SorterConfig, sortOptionsFromConfig } from './config.js';
import {
  decodeProjectText,
  findProjectFiles,
  resolveProjectPath,
  sortProjectFile,
} from './project.js';
import { sortProjectText } from './router.js';
import {
  ConfigError,
  NotATargetFileError,
  ProjectIOError,
  SortOptions,
  UnbalancedRecordError,
  UnterminatedRegionError,
  UsageError,
} from './types.js';
import packageJson from '../package.json';

/** Exit status for a clean run */
export const EXIT_OK = 0;

/** Usage error, or something unsorted in check mode */
export const EXIT_UNSORTED = 1;

/** At least one file failed fatally */
export const EXIT_FAILED = 2;

export interface ParsedArgs {
  mode: 'help' | 'version' | 'files' | 'stdin';
  paths: string[];
  checkOnly: boolean;
  /** Undefined when neither case flag was given */
  caseInsensitive?: boolean;
  warnings: boolean;
  recursive: boolean;
  failFast: boolean;
  configPath?: string;
}

/**
 * Parse command line arguments
 *
 * @throws {UsageError} On unknown options, conflicting flags, or no inputs
 */
export function parseArgs(args: string[]): ParsedArgs {
  if (args.includes('--help') || args.includes('-h')) {
    return emptyArgs('help');
  }
  if (args.includes('--version') || args.includes('-v')) {
    return emptyArgs('version');
  }

  const parsed = emptyArgs('files');
  let sensitive = false;
  let insensitive = false;
  let stdin = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--check') {
      parsed.checkOnly = true;
    } else if (arg === '--case-insensitive') {
      insensitive = true;
    } else if (arg === '--case-sensitive') {
      sensitive = true;
    } else if (arg === '--no-warnings' || arg === '-w') {
      parsed.warnings = false;
    } else if (arg === '--recursive' || arg === '-r') {
      parsed.recursive = true;
    } else if (arg === '--fail-fast') {
      parsed.failFast = true;
    } else if (arg === '--config' || arg === '-c') {
      const configPath = args[++i];
      if (!configPath) {
        throw new UsageError('--config requires a path argument');
      }
      parsed.configPath = configPath;
    } else if (arg === '-') {
      stdin = true;
    } else if (!arg.startsWith('-')) {
      parsed.paths.push(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (sensitive && insensitive) {
    throw new UsageError('--case-insensitive and --case-sensitive are mutually exclusive');
  }
  if (sensitive || insensitive) {
    parsed.caseInsensitive = insensitive;
  }

  if (stdin) {
    if (parsed.paths.length > 0) {
      throw new UsageError('- (stdin) cannot be combined with file arguments');
    }
    parsed.mode = 'stdin';
  } else if (parsed.paths.length === 0) {
    throw new UsageError('No Xcode project files (project.pbxproj) listed on the command line');
  }

  return parsed;
}

function emptyArgs(mode: ParsedArgs['mode']): ParsedArgs {
  return {
    mode,
    paths: [],
    checkOnly: false,
    warnings: true,
    recursive: false,
    failFast: false,
  };
}

/**
 * Print usage information to stderr
 */
function printUsage(): void {
  console.error(`
Usage: pbxsort [options] <project.pbxproj | App.xcodeproj | dir>...
       pbxsort [options] -

Sort the arrays and safe sections of Xcode project.pbxproj files in place.

Arguments:
  <path>                  project.pbxproj file or .xcodeproj bundle
  -                       Read a project file from stdin, write the sorted text to stdout

Options:
  --check                 Exit 1 if any file is not sorted; never writes
  --case-insensitive      Case-insensitive natural sort
  --case-sensitive        Case-sensitive natural sort (default)
  -r, --recursive         Search directory arguments for .xcodeproj bundles
  --fail-fast             Stop at the first file that fails
  -w, --no-warnings       Suppress warnings
  -c, --config <path>     Path to pbxsort.json
                          (defaults to PBXSORT_CONFIG env var or ./pbxsort.json)
  -v, --version           Show version
  -h, --help              Show this help message

Exit codes:
  0  Success
  1  Usage error, or unsorted files in --check mode
  2  A file could not be sorted

Examples:
  pbxsort App.xcodeproj
  pbxsort --check -r .
  git show HEAD:App.xcodeproj/project.pbxproj | pbxsort - > sorted.pbxproj
`);
}

/**
 * Read all stdin as raw bytes
 */
async function readStdin(): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on('data', (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on('end', () => resolve(Buffer.concat(chunks)));
    process.stdin.on('error', reject);
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isFileFailure(error: unknown): boolean {
  return (
    error instanceof UnterminatedRegionError ||
    error instanceof UnbalancedRecordError ||
    error instanceof ProjectIOError
  );
}

/**
 * Expand command-line paths into project files
 *
 * Paths that are not project files are warned about and skipped.
 * Missing files are reported and counted as failures.
 */
function collectTargets(
  args: ParsedArgs,
  warn: (message: string) => void
): { targets: string[]; missing: number } {
  const targets: string[] = [];
  let missing = 0;

  for (const input of args.paths) {
    if (
      args.recursive &&
      !path.basename(input).endsWith('.xcodeproj') &&
      fs.existsSync(input) &&
      fs.statSync(input).isDirectory()
    ) {
      const found = findProjectFiles(input);
      if (found.length === 0) {
        warn(`No Xcode projects found under ${input}`);
      }
      targets.push(...found);
      continue;
    }

    let projectPath: string;
    try {
      projectPath = resolveProjectPath(input);
    } catch (error) {
      if (error instanceof NotATargetFileError) {
        warn(error.message);
        continue;
      }
      throw error;
    }

    if (!fs.existsSync(projectPath) || !fs.statSync(projectPath).isFile()) {
      console.error(`ERROR: File not found: ${projectPath}`);
      missing++;
      continue;
    }
    targets.push(projectPath);
  }

  return { targets, missing };
}

async function runStdin(args: ParsedArgs, options: SortOptions): Promise<number> {
  const bytes = await readStdin();

  try {
    const outcome = sortProjectText(decodeProjectText(bytes, '<stdin>'), options);
    if (args.checkOnly) {
      if (outcome.changed) {
        console.error(formatCheckResult(summarizeRegions(outcome.regions, false), '<stdin>'));
        return EXIT_UNSORTED;
      }
      return EXIT_OK;
    }
    process.stdout.write(outcome.text);
    return EXIT_OK;
  } catch (error) {
    if (isFileFailure(error)) {
      console.error(`ERROR: <stdin>: ${errorMessage(error)}`);
      return EXIT_FAILED;
    }
    throw error;
  }
}

function runFiles(args: ParsedArgs, options: SortOptions): number {
  const warn = (message: string): void => {
    if (args.warnings) {
      console.error(`WARNING: ${message}`);
    }
  };

  const { targets, missing } = collectTargets(args, warn);
  let failures = missing;
  let unsorted = 0;

  if (failures > 0 && args.failFast) {
    return EXIT_FAILED;
  }

  for (const target of targets) {
    try {
      const result = sortProjectFile(target, options, args.checkOnly);
      if (args.checkOnly && !result.alreadySorted) {
        unsorted++;
        console.error(formatCheckResult(summarizeRegions(result.regions, false), target));
      }
    } catch (error) {
      if (!isFileFailure(error)) {
        throw error;
      }
      console.error(`ERROR: ${target}: ${errorMessage(error)}`);
      failures++;
      if (args.failFast) {
        break;
      }
    }
  }

  if (failures > 0) {
    return EXIT_FAILED;
  }
  return unsorted > 0 ? EXIT_UNSORTED : EXIT_OK;
}

/**
 * Run the command line and return the exit status
 *
 * @param args - Arguments without the node and script paths
 */
export async function run(args: string[]): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      printUsage();
      return EXIT_UNSORTED;
    }
    throw error;
  }

  if (parsed.mode === 'help') {
    printUsage();
    return EXIT_OK;
  }
  if (parsed.mode === 'version') {
    process.stdout.write(`pbxsort ${packageJson.version}\n`);
    return EXIT_OK;
  }

  let config: SorterConfig;
  let options: SortOptions;
  try {
    config = loadConfig(parsed.configPath);
    options = sortOptionsFromConfig(config, parsed.caseInsensitive);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`ERROR: ${error.message}`);
      return EXIT_UNSORTED;
    }
    throw error;
  }

  if (parsed.mode === 'stdin') {
    return runStdin(parsed, options);
  }
  return runFiles(parsed, options);
}

// Only run when executed directly, not when imported for testing
if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = EXIT_UNSORTED;
    });
}
