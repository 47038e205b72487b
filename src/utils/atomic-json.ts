/**
 * @fileoverview Atomic JSON file writes.
 *
 * Writes go to a temp file first and are then renamed over the target, so a crash mid-write
 * leaves either the old or the new content, never a truncated file.
 *
 * @module utils/atomic-json
 */

import { existsSync, mkdirSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * Serializes `value` with two-space indentation and atomically replaces `filePath`.
 * Creates the parent directory when needed.
 *
 * @throws Error when serialization or the write fails; the temp file is removed first
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const json = JSON.stringify(value, null, 2) + '\n';
  mkdirSync(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    writeFileSync(tempPath, json, 'utf-8');
    renameSync(tempPath, filePath);
  } catch (err) {
    try {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
    } catch (cleanupErr) {
      console.warn('[atomic-json] Failed to cleanup temp file after write error:', cleanupErr);
    }
    throw err;
  }
}

/**
 * Removes a file if it exists.
 * @returns True when a file was removed
 */
export function removeIfExists(filePath: string): boolean {
  if (!existsSync(filePath)) {
    return false;
  }
  unlinkSync(filePath);
  return true;
}
