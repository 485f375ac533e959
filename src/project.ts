/**
 * File-level operations on Xcode project files
 * Resolves paths, discovers projects under a directory, and sorts files in place
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import { sortProjectText } from './router.js';
import { FileSortResult, NotATargetFileError, ProjectIOError, SortOptions } from './types.js';
import { writeFileAtomic } from './writer.js';

/** Basename of the document inside every .xcodeproj bundle */
export const PROJECT_FILE_NAME = 'project.pbxproj';

const BUNDLE_SUFFIX = '.xcodeproj';

// Directories never searched during discovery
const SKIPPED_DIRECTORIES = new Set(['node_modules']);

/**
 * Resolve a command-line path to a project.pbxproj file
 *
 * @param input - Path to a project.pbxproj or an .xcodeproj bundle
 * @returns Path to the project.pbxproj file
 * @throws {NotATargetFileError} When the path names anything else
 *
 * @example
 * ```typescript
 * resolveProjectPath('App.xcodeproj')                // 'App.xcodeproj/project.pbxproj'
 * resolveProjectPath('App.xcodeproj/project.pbxproj') // unchanged
 * resolveProjectPath('notes.txt')                    // throws NotATargetFileError
 * ```
 */
export function resolveProjectPath(input: string): string {
  const projectPath = path.basename(input).endsWith(BUNDLE_SUFFIX)
    ? path.join(input, PROJECT_FILE_NAME)
    : input;

  if (path.basename(projectPath) !== PROJECT_FILE_NAME) {
    throw new NotATargetFileError(projectPath);
  }
  return projectPath;
}

/**
 * Find every .xcodeproj/project.pbxproj below a directory
 *
 * Skips hidden directories, node_modules, and symbolic links.
 *
 * @param root - Directory to search
 * @returns Project file paths in sorted order
 */
export function findProjectFiles(root: string): string[] {
  const found: string[] = [];
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      if (SKIPPED_DIRECTORIES.has(entry.name)) continue;

      const full = path.join(dir, entry.name);
      if (entry.name.endsWith(BUNDLE_SUFFIX)) {
        const projectFile = path.join(full, PROJECT_FILE_NAME);
        if (fs.existsSync(projectFile)) {
          found.push(projectFile);
        }
      } else {
        pending.push(full);
      }
    }
  }

  return found.sort();
}

// Rejects malformed input instead of substituting U+FFFD; keeps a leading BOM
const UTF8_DECODER = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode project file bytes as strict UTF-8
 *
 * @param bytes - Raw file content
 * @param source - File path or `<stdin>`, recorded on the error
 * @throws {ProjectIOError} When the bytes are not valid UTF-8
 */
export function decodeProjectText(bytes: Uint8Array, source: string): string {
  try {
    return UTF8_DECODER.decode(bytes);
  } catch (error) {
    throw new ProjectIOError('Content is not valid UTF-8', source, error);
  }
}

/**
 * Read a project file as strict UTF-8
 *
 * @throws {ProjectIOError} When the file cannot be read or is not valid UTF-8
 */
export function readProjectFile(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    throw new ProjectIOError(
      `Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error
    );
  }
  return decodeProjectText(bytes, filePath);
}

/**
 * Sort one project file in place, or only check it
 *
 * Nothing is written when the file is already sorted, in check mode, or
 * when parsing fails: fatal format errors leave the file byte-identical.
 *
 * @param filePath - Path to a project.pbxproj file
 * @param options - Sort options; omitted fields take their defaults
 * @param checkOnly - Compare against the sorted form without writing
 * @throws {UnterminatedRegionError} On an unterminated array or section
 * @throws {UnbalancedRecordError} On a block record with unbalanced braces
 * @throws {ProjectIOError} When reading or writing fails
 */
export function sortProjectFile(
  filePath: string,
  options: Partial<SortOptions> = {},
  checkOnly = false
): FileSortResult {
  const content = readProjectFile(filePath);
  const outcome = sortProjectText(content, options);

  const written = outcome.changed && !checkOnly;
  if (written) {
    writeFileAtomic(filePath, outcome.text);
  }

  return {
    filePath,
    alreadySorted: !outcome.changed,
    written,
    regions: outcome.regions,
  };
}
