/**
 * Atomic file replacement
 * Writes a sibling temp file, syncs it, and renames it over the target
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { ProjectIOError } from './types.js';

/**
 * Build the temp file path for a target
 *
 * Lives in the target's directory so the final rename stays on one filesystem.
 */
export function tempPathFor(target: string): string {
  const suffix = `${process.pid}.${crypto.randomBytes(6).toString('hex')}`;
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

// fs errors may come from another realm, so match the code rather than the class
function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function targetMode(target: string): number {
  try {
    return fs.statSync(target).mode & 0o777;
  } catch (error) {
    if (isMissingFileError(error)) {
      return 0o644;
    }
    throw error;
  }
}

/**
 * Replace a file's content atomically
 *
 * The target is either left as it was or fully replaced. On any failure
 * the temp file is removed before the error propagates.
 *
 * @param target - File to replace (created when missing)
 * @param content - Complete new content
 * @throws {ProjectIOError} When any step fails; `cause` holds the fs error
 *
 * @example
 * ```typescript
 * writeFileAtomic('/path/App.xcodeproj/project.pbxproj', sortedText);
 * ```
 */
export function writeFileAtomic(target: string, content: string): void {
  const tmpPath = tempPathFor(target);
  let fd: number | null = null;

  try {
    fd = fs.openSync(tmpPath, 'wx', targetMode(target));
    fs.writeFileSync(fd, content, 'utf8');
    fs.fsyncSync(fd);
    fs.closeSync(fd);
    fd = null;
    fs.renameSync(tmpPath, target);
  } catch (error) {
    if (fd !== null) {
      fs.closeSync(fd);
    }
    fs.rmSync(tmpPath, { force: true });
    throw new ProjectIOError(
      `Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`,
      target,
      error
    );
  }
}
