/**
 * @fileoverview Checkpoint ledger for long per-item loops.
 *
 * A SPEC phase that processes N items ("enrich profile 7 of 40") records its cursor and
 * its completed/failed ledgers in `<project>/.state/checkpoints/<spec>.json`, so that an
 * interrupted session resumes at the right item instead of replaying finished work.
 *
 * Lifecycle:
 * ```
 * init ──> in_progress ──(completedItems.length >= totalItems)──> completed
 *              │  ▲
 *              └──┘ update / complete / fail
 * clear: removes the checkpoint, its decision log and (by default) the canonical TODO
 * ```
 *
 * The ledgers are append-only and `status` never returns to `in_progress`. Failures are
 * informational: they never change `status`. Writes are best effort; a failed write is
 * logged and the caller keeps going.
 *
 * @module checkpoint-store
 */

import { appendFileSync, existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { CanonicalStore } from './canonical-store.js';
import { DECISIONS_FILE_SUFFIX, DEFAULT_LOOP_PHASE, resolveStatePaths } from './config/guard-config.js';
import { CheckpointSchema } from './schemas.js';
import type { Checkpoint } from './types.js';
import { getErrorMessage } from './types.js';
import { removeIfExists, writeJsonAtomic } from './utils/atomic-json.js';

const SPEC_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Raised by update/complete/fail/decide when no checkpoint exists for the SPEC */
export class CheckpointNotFoundError extends Error {
  constructor(readonly specName: string) {
    super(`No checkpoint found for ${specName}. Run 'init' first.`);
    this.name = 'CheckpointNotFoundError';
  }
}

/** Raised when a checkpoint file exists but cannot be parsed */
export class CheckpointCorruptError extends Error {
  constructor(
    readonly specName: string,
    readonly filePath: string,
    detail: string,
  ) {
    super(`Checkpoint for ${specName} is unreadable (${filePath}): ${detail}`);
    this.name = 'CheckpointCorruptError';
  }
}

/** Raised when a SPEC name cannot be used as a file stem */
export class InvalidSpecNameError extends Error {
  constructor(readonly specName: string) {
    super(`Invalid SPEC name "${specName}": use letters, digits, '.', '_' and '-' only`);
    this.name = 'InvalidSpecNameError';
  }
}

/** What `clear` actually removed */
export interface ClearResult {
  checkpointRemoved: boolean;
  decisionsRemoved: boolean;
  canonicalRemoved: boolean;
}

function assertIndex(index: number): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new Error(`Item index must be a non-negative integer, got ${index}`);
  }
}

/**
 * Checkpoint state machine for one project.
 *
 * The canonical store is paired so that clearing a finished run also drops its TODO
 * baseline; otherwise the old task ids would keep the next run's removals from being
 * detected (they would look like a fresh start instead).
 */
export class CheckpointStore {
  readonly checkpointDir: string;
  private readonly canonical: CanonicalStore;
  private readonly now: () => Date;

  constructor(projectDir: string, options: { canonical?: CanonicalStore; now?: () => Date } = {}) {
    this.checkpointDir = resolveStatePaths(projectDir).checkpointDir;
    this.canonical = options.canonical ?? new CanonicalStore(projectDir);
    this.now = options.now ?? (() => new Date());
  }

  checkpointPath(specName: string): string {
    this.assertSpecName(specName);
    return join(this.checkpointDir, `${specName}.json`);
  }

  decisionsPath(specName: string): string {
    this.assertSpecName(specName);
    return join(this.checkpointDir, `${specName}${DECISIONS_FILE_SUFFIX}`);
  }

  /**
   * Starts a fresh checkpoint, overwriting any previous one of the same name.
   */
  init(
    specName: string,
    totalItems: number,
    loopPhase: string = DEFAULT_LOOP_PHASE,
    specFile: string | null = null,
  ): Checkpoint {
    if (!Number.isInteger(totalItems) || totalItems < 0) {
      throw new Error(`Total items must be a non-negative integer, got ${totalItems}`);
    }
    const timestamp = this.timestamp();
    const checkpoint: Checkpoint = {
      specName,
      specFile,
      loopPhase,
      startedAt: timestamp,
      lastUpdated: timestamp,
      totalItems,
      currentIndex: 0,
      currentItemId: null,
      currentItemName: null,
      currentTask: null,
      completedItems: [],
      failedItems: [],
      status: 'in_progress',
    };
    this.persist(checkpoint);
    return checkpoint;
  }

  /**
   * Reads a checkpoint.
   * @returns The checkpoint, or null when none exists
   * @throws CheckpointCorruptError when the file exists but is unreadable
   */
  read(specName: string): Checkpoint | null {
    const path = this.checkpointPath(specName);
    if (!existsSync(path)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new CheckpointCorruptError(specName, path, getErrorMessage(err));
    }
    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CheckpointCorruptError(specName, path, parsed.error.issues[0]?.message ?? 'invalid');
    }
    return parsed.data;
  }

  /**
   * Moves the cursor. Item id and name are only replaced when given, so a task-level update
   * inside one item keeps the item's identity.
   */
  update(specName: string, index: number, currentTask: string, itemId?: string, itemName?: string): Checkpoint {
    assertIndex(index);
    const checkpoint = this.require(specName);
    checkpoint.currentIndex = index;
    checkpoint.currentTask = currentTask;
    if (itemId) checkpoint.currentItemId = itemId;
    if (itemName) checkpoint.currentItemName = itemName;
    checkpoint.lastUpdated = this.timestamp();
    this.persist(checkpoint);
    return checkpoint;
  }

  /**
   * Appends to the completed ledger. The ledger has no deduplication: completing the same
   * index twice counts twice.
   */
  complete(specName: string, index: number, itemId?: string): Checkpoint {
    assertIndex(index);
    const checkpoint = this.require(specName);
    const timestamp = this.timestamp();
    checkpoint.completedItems.push({
      index,
      itemId: itemId ?? checkpoint.currentItemId,
      completedAt: timestamp,
    });
    checkpoint.lastUpdated = timestamp;
    if (checkpoint.completedItems.length >= checkpoint.totalItems) {
      checkpoint.status = 'completed';
    }
    this.persist(checkpoint);
    return checkpoint;
  }

  /** Appends to the failed ledger. Status is left alone. */
  fail(specName: string, index: number, itemId?: string, reason: string = ''): Checkpoint {
    assertIndex(index);
    const checkpoint = this.require(specName);
    const timestamp = this.timestamp();
    checkpoint.failedItems.push({
      index,
      itemId: itemId ?? checkpoint.currentItemId,
      failedAt: timestamp,
      reason,
    });
    checkpoint.lastUpdated = timestamp;
    this.persist(checkpoint);
    return checkpoint;
  }

  /**
   * Appends a line to the checkpoint's decision log, creating the log on first use.
   * @returns Path of the decision log
   */
  recordDecision(specName: string, text: string): string {
    this.require(specName);
    const path = this.decisionsPath(specName);
    const line = `- ${this.timestamp()} ${text.trim()}\n`;
    try {
      if (existsSync(path)) {
        appendFileSync(path, line, 'utf-8');
      } else {
        writeFileSync(path, `# Decisions: ${specName}\n\n${line}`, 'utf-8');
      }
    } catch (err) {
      console.warn(`[CheckpointStore] Failed to write decision log ${path}: ${getErrorMessage(err)}`);
    }
    return path;
  }

  /**
   * Removes the checkpoint and its decision log; with `alsoClearCanonical` (the default)
   * also removes the project's canonical TODO.
   */
  clear(specName: string, alsoClearCanonical: boolean = true): ClearResult {
    return {
      checkpointRemoved: removeIfExists(this.checkpointPath(specName)),
      decisionsRemoved: removeIfExists(this.decisionsPath(specName)),
      canonicalRemoved: alsoClearCanonical ? this.canonical.clear() : false,
    };
  }

  private require(specName: string): Checkpoint {
    const checkpoint = this.read(specName);
    if (!checkpoint) {
      throw new CheckpointNotFoundError(specName);
    }
    return checkpoint;
  }

  private persist(checkpoint: Checkpoint): void {
    const path = this.checkpointPath(checkpoint.specName);
    try {
      writeJsonAtomic(path, checkpoint);
    } catch (err) {
      console.warn(`[CheckpointStore] Failed to save checkpoint ${path}: ${getErrorMessage(err)}`);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private assertSpecName(specName: string): void {
    if (!SPEC_NAME_PATTERN.test(specName)) {
      throw new InvalidSpecNameError(specName);
    }
  }
}
