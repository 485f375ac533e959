/**
 * MCP tool request handlers
 * Exposes sorting, checking, and rule listing to MCP clients
 */

import { checkProjectFile, formatCheckResult } from './checker.js';
import { SorterConfig, sortOptionsFromConfig } from './config.js';
import { PROTECTED_SECTION } from './parser.js';
import { resolveProjectPath, sortProjectFile } from './project.js';
import { sortProjectText } from './router.js';
import { ArrayName } from './types.js';

/**
 * Tool argument interfaces for type safety
 */
interface ProjectFileArgs {
  file_path: string;
  case_insensitive?: boolean;
}

interface SortTextArgs {
  text: string;
  case_insensitive?: boolean;
}

/**
 * MCP tool response structure
 *
 * Standard response format for all tool handlers.
 * Index signature required for MCP SDK compatibility.
 */
interface ToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  [key: string]: unknown;
}

/** Arrays the router sorts, in the order rules are listed */
const SORTED_ARRAYS: readonly ArrayName[] = [
  'children',
  'files',
  'buildConfigurations',
  'targets',
  'packageProductDependencies',
  'packageReferences',
];

function hasOptionalCaseFlag(args: object): boolean {
  return (
    !('case_insensitive' in args) ||
    args.case_insensitive === undefined ||
    typeof args.case_insensitive === 'boolean'
  );
}

/**
 * Type guard for ProjectFileArgs
 */
function isProjectFileArgs(args: unknown): args is ProjectFileArgs {
  return (
    typeof args === 'object' &&
    args !== null &&
    'file_path' in args &&
    typeof args.file_path === 'string' &&
    hasOptionalCaseFlag(args)
  );
}

/**
 * Type guard for SortTextArgs
 */
function isSortTextArgs(args: unknown): args is SortTextArgs {
  return (
    typeof args === 'object' &&
    args !== null &&
    'text' in args &&
    typeof args.text === 'string' &&
    hasOptionalCaseFlag(args)
  );
}

function textResponse(text: string): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
  };
}

/**
 * Handle sort_project tool request
 *
 * Sorts a project file in place and reports the regions that changed.
 *
 * @param args - Tool arguments containing file_path and optional case_insensitive
 * @param config - Loaded sorter configuration
 * @returns Tool response with a JSON summary
 * @throws Error if arguments are invalid or the file cannot be sorted
 *
 * @example
 * ```typescript
 * handleSortProject({ file_path: '/work/App.xcodeproj' }, config);
 * // Returns: {"file": ".../project.pbxproj", "alreadySorted": false, "written": true, ...}
 * ```
 */
export function handleSortProject(args: unknown, config: SorterConfig): ToolResponse {
  if (!isProjectFileArgs(args)) {
    throw new Error('Invalid arguments: expected { file_path: string, case_insensitive?: boolean }');
  }

  try {
    const filePath = resolveProjectPath(args.file_path);
    const result = sortProjectFile(filePath, sortOptionsFromConfig(config, args.case_insensitive));

    const changedRegions = result.regions
      .filter((r) => r.reordered || r.duplicates > 0)
      .map((r) => ({
        kind: r.kind,
        name: r.name,
        line: r.line,
        duplicatesRemoved: r.duplicates,
        reordered: r.reordered,
      }));

    return textResponse(
      JSON.stringify(
        {
          file: result.filePath,
          alreadySorted: result.alreadySorted,
          written: result.written,
          changedRegions,
        },
        null,
        2
      )
    );
  } catch (error) {
    throw new Error(
      `Failed to sort project: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Handle check_project tool request
 *
 * Reports whether a project file is sorted, without modifying it.
 *
 * @param args - Tool arguments containing file_path and optional case_insensitive
 * @param config - Loaded sorter configuration
 * @returns Tool response with the formatted check report
 */
export function handleCheckProject(args: unknown, config: SorterConfig): ToolResponse {
  if (!isProjectFileArgs(args)) {
    throw new Error('Invalid arguments: expected { file_path: string, case_insensitive?: boolean }');
  }

  try {
    const filePath = resolveProjectPath(args.file_path);
    const result = checkProjectFile(filePath, sortOptionsFromConfig(config, args.case_insensitive));
    return textResponse(formatCheckResult(result, filePath));
  } catch (error) {
    throw new Error(
      `Failed to check project: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Handle sort_text tool request
 *
 * Sorts project file content passed inline and returns the sorted text.
 *
 * @param args - Tool arguments containing text and optional case_insensitive
 * @param config - Loaded sorter configuration
 */
export function handleSortText(args: unknown, config: SorterConfig): ToolResponse {
  if (!isSortTextArgs(args)) {
    throw new Error('Invalid arguments: expected { text: string, case_insensitive?: boolean }');
  }

  try {
    const outcome = sortProjectText(args.text, sortOptionsFromConfig(config, args.case_insensitive));
    return textResponse(outcome.text);
  } catch (error) {
    throw new Error(
      `Failed to sort text: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Handle list_rules tool request
 *
 * Lists what the sorter reorders and what it always leaves alone.
 *
 * @param _args - Tool arguments (unused)
 * @param config - Loaded sorter configuration
 */
export function handleListRules(_args: unknown, config: SorterConfig): ToolResponse {
  const rules = `# Sorting Rules

## Sorted Arrays

${SORTED_ARRAYS.map((name) => `- ${name}${name === 'files' ? ' (by name only)' : ' (directory-like names first)'}`).join('\n')}

## Sorted Sections

${config.sortableSections.map((section) => `- ${section}`).join('\n')}

## Never Sorted

- ${PROTECTED_SECTION} (link order)
- Every other section is copied unchanged

## Known Extension-less Files

${config.knownFiles.map((file) => `- ${file}`).join('\n')}

## Mode

- Case-insensitive: ${config.caseInsensitive ? 'yes' : 'no'}
- Configuration: ${config.source ?? 'built-in defaults'}
`;

  return textResponse(rules);
}
