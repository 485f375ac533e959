/**
 * Configuration loading for the sorter
 * Resolves an optional JSON file that extends the built-in allow-lists
 */

import * as fs from 'fs';
import * as path from 'path';
import { PROTECTED_SECTION } from './parser.js';
import { ConfigError, SortOptions } from './types.js';

/** Environment variable naming the configuration file */
export const CONFIG_ENV_VAR = 'PBXSORT_CONFIG';

/** Configuration file picked up from the working directory when present */
export const DEFAULT_CONFIG_FILE = 'pbxsort.json';

/**
 * Section kinds whose records can be reordered without changing build behavior
 *
 * Build phases, targets and the project are listed so the arrays inside
 * their records get sorted; link order lives only in PBXFrameworksBuildPhase.
 */
export const DEFAULT_SORTABLE_SECTIONS: readonly string[] = [
  'PBXBuildFile',
  'PBXContainerItemProxy',
  'PBXFileReference',
  'PBXGroup',
  'PBXHeadersBuildPhase',
  'PBXNativeTarget',
  'PBXProject',
  'PBXReferenceProxy',
  'PBXResourcesBuildPhase',
  'PBXSourcesBuildPhase',
  'PBXTargetDependency',
  'PBXVariantGroup',
  'XCBuildConfiguration',
  'XCConfigurationList',
];

/**
 * Extension-less names that are files, so they sort with files rather than groups
 */
export const DEFAULT_KNOWN_FILES: readonly string[] = ['create_hash_table'];

/** Lines one brace-balanced record may span before it counts as malformed */
export const DEFAULT_MAX_RECORD_LINES = 10000;

/**
 * Sorter configuration as loaded from disk
 *
 * List fields extend the defaults rather than replace them.
 */
export interface SorterConfig {
  caseInsensitive: boolean;
  knownFiles: string[];
  sortableSections: string[];
  /** Path the configuration came from, null for built-in defaults */
  source: string | null;
}

const CONFIG_KEYS = new Set(['caseInsensitive', 'knownFiles', 'sortableSections']);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string' && v.length > 0);
}

function defaultConfig(): SorterConfig {
  return {
    caseInsensitive: false,
    knownFiles: [...DEFAULT_KNOWN_FILES],
    sortableSections: [...DEFAULT_SORTABLE_SECTIONS],
    source: null,
  };
}

/**
 * Parse configuration JSON text
 *
 * @param text - File content
 * @param source - Path used in error messages
 * @returns Configuration with list fields merged onto the defaults
 * @throws {ConfigError} On invalid JSON, unknown keys, or wrong value types
 *
 * @example
 * ```typescript
 * parseConfig('{"knownFiles": ["generate_bindings"]}', 'pbxsort.json').knownFiles
 * // Returns: ['create_hash_table', 'generate_bindings']
 * ```
 */
export function parseConfig(text: string, source: string): SorterConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Configuration in ${source} must be a JSON object`);
  }

  const config = defaultConfig();
  config.source = source;

  for (const [key, value] of Object.entries(raw)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new ConfigError(
        `Unknown configuration key "${key}" in ${source}. Valid keys: ${Array.from(CONFIG_KEYS).join(', ')}`
      );
    }
    if (key === 'caseInsensitive') {
      if (typeof value !== 'boolean') {
        throw new ConfigError(`"caseInsensitive" in ${source} must be a boolean`);
      }
      config.caseInsensitive = value;
    } else if (!isStringArray(value)) {
      throw new ConfigError(`"${key}" in ${source} must be an array of non-empty strings`);
    } else if (key === 'knownFiles') {
      config.knownFiles = Array.from(new Set([...config.knownFiles, ...value]));
    } else {
      config.sortableSections = Array.from(new Set([...config.sortableSections, ...value]));
    }
  }

  validateConfiguration(config);
  return config;
}

/**
 * Validate a configuration
 *
 * @throws {ConfigError} When the protected section is made sortable
 */
export function validateConfiguration(config: { sortableSections: readonly string[] }): void {
  if (config.sortableSections.includes(PROTECTED_SECTION)) {
    throw new ConfigError(
      `${PROTECTED_SECTION} cannot be sortable: its entry order is link-order significant`
    );
  }
}

/**
 * Load configuration
 *
 * Lookup order: explicit path, then the PBXSORT_CONFIG environment
 * variable, then ./pbxsort.json when it exists. Without any of these the
 * built-in defaults apply.
 *
 * @param configPath - Optional explicit configuration file
 * @throws {ConfigError} When an explicitly named file is missing or invalid
 */
export function loadConfig(configPath?: string): SorterConfig {
  const explicit = configPath ?? process.env[CONFIG_ENV_VAR];

  if (explicit) {
    const resolved = path.resolve(explicit);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Configuration file not found: ${resolved}`);
    }
    return parseConfig(fs.readFileSync(resolved, 'utf8'), resolved);
  }

  const fallback = path.resolve(DEFAULT_CONFIG_FILE);
  if (fs.existsSync(fallback)) {
    return parseConfig(fs.readFileSync(fallback, 'utf8'), fallback);
  }

  return defaultConfig();
}

/**
 * Fill in defaults for a partial set of sort options
 *
 * @throws {ConfigError} When the protected section is listed as sortable
 *
 * @example
 * ```typescript
 * resolveSortOptions({ caseInsensitive: true }).knownFiles
 * // Returns: ['create_hash_table']
 * ```
 */
export function resolveSortOptions(options: Partial<SortOptions> = {}): SortOptions {
  const resolved: SortOptions = {
    caseInsensitive: options.caseInsensitive ?? false,
    knownFiles: options.knownFiles ?? DEFAULT_KNOWN_FILES,
    sortableSections: options.sortableSections ?? DEFAULT_SORTABLE_SECTIONS,
    maxRecordLines: options.maxRecordLines ?? DEFAULT_MAX_RECORD_LINES,
  };
  validateConfiguration(resolved);
  return resolved;
}

/**
 * Derive sort options from a loaded configuration
 *
 * @param config - Loaded configuration
 * @param caseInsensitive - Override from the command line or a tool call
 */
export function sortOptionsFromConfig(
  config: SorterConfig,
  caseInsensitive?: boolean
): SortOptions {
  return resolveSortOptions({
    caseInsensitive: caseInsensitive ?? config.caseInsensitive,
    knownFiles: config.knownFiles,
    sortableSections: config.sortableSections,
  });
}
