/**
 * @fileoverview Durable canonical TODO snapshot.
 *
 * The snapshot at `<project>/.state/todo-canonical.json` is the last validated task list.
 * Every accepted write replaces it wholesale. A snapshot that cannot be parsed or fails
 * validation is reported as corrupt and never repaired here: the agent regenerates its TODO
 * from the SPEC and the operator clears the file.
 *
 * @module canonical-store
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolveStatePaths } from './config/guard-config.js';
import { CanonicalSnapshotSchema } from './schemas.js';
import { findSpecFile, toSpecRef } from './spec-extractor.js';
import { extractTaskIds, sortTaskIds } from './task-id.js';
import type { CanonicalLoadResult, CanonicalSnapshot, SnapshotMetadata, TaskItem } from './types.js';
import { getErrorMessage } from './types.js';
import { removeIfExists, writeJsonAtomic } from './utils/atomic-json.js';

/**
 * Builds a snapshot from a task list. `taskCount` and `taskIds` are always recomputed from
 * the items, never carried over.
 */
export function createSnapshot(
  todos: readonly TaskItem[],
  metadata: { specFile: string | null; expectedCount: number | null },
  now: Date = new Date(),
): CanonicalSnapshot {
  return {
    createdAt: now.toISOString(),
    specFile: metadata.specFile,
    expectedCount: metadata.expectedCount,
    taskCount: todos.length,
    taskIds: sortTaskIds(extractTaskIds(todos)),
    todos: todos.map((todo) => ({ ...todo })),
  };
}

/**
 * Reads and writes the canonical snapshot of one project.
 *
 * @example
 * ```typescript
 * const store = new CanonicalStore('/work/catalog');
 * const loaded = store.load();
 * if (loaded.kind === 'ok') {
 *   console.log(loaded.snapshot.taskIds);
 * }
 * ```
 */
export class CanonicalStore {
  readonly filePath: string;

  constructor(private readonly projectDir: string) {
    this.filePath = resolveStatePaths(projectDir).canonicalFile;
  }

  /** Loads the snapshot, distinguishing "none yet" from "unreadable". */
  load(): CanonicalLoadResult {
    if (!existsSync(this.filePath)) {
      return { kind: 'missing' };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      return this.corrupt(`Failed to read canonical: ${getErrorMessage(err)}`);
    }

    const parsed = CanonicalSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return this.corrupt(`Canonical snapshot is malformed${where}: ${issue?.message ?? 'invalid'}`);
    }
    return { kind: 'ok', snapshot: parsed.data };
  }

  /**
   * Replaces the snapshot with `todos`.
   *
   * When `specFile` is left undefined the project is searched for a SPEC so recovery
   * instructions can name it; pass `null` to record that there is none.
   *
   * @throws Error when the file cannot be written
   */
  save(todos: readonly TaskItem[], metadata: SnapshotMetadata = {}): CanonicalSnapshot {
    const specFile = metadata.specFile === undefined ? this.detectSpecFile() : metadata.specFile;
    const snapshot = createSnapshot(todos, {
      specFile,
      expectedCount: metadata.expectedCount ?? null,
    });
    writeJsonAtomic(this.filePath, snapshot);
    return snapshot;
  }

  /**
   * Deletes the snapshot.
   * @returns True when a snapshot existed
   */
  clear(): boolean {
    return removeIfExists(this.filePath);
  }

  private detectSpecFile(): string | null {
    const found = findSpecFile(this.projectDir);
    return found ? toSpecRef(this.projectDir, found) : null;
  }

  private corrupt(detail: string): CanonicalLoadResult {
    return { kind: 'corrupt', error: { kind: 'malformed_canonical', path: this.filePath, detail } };
  }
}
