/**
 * @fileoverview Type definitions for spec-guard
 *
 * Record types are inferred from the zod schemas in `schemas.ts` so the validated shape and
 * the static type cannot drift. This module adds the result unions the engine returns and
 * the error helpers shared by the CLI.
 */

import type { z } from 'zod';
import type {
  CanonicalSnapshotSchema,
  CheckpointSchema,
  CheckpointStatusSchema,
  CompletedItemSchema,
  FailedItemSchema,
  SpecDocumentSchema,
  SpecPhaseSchema,
  SpecTaskSchema,
  TaskItemSchema,
  TodoStatusSchema,
} from './schemas.js';

// ========== Task List Types ==========

/** Status of a TodoWrite item */
export type TodoStatus = z.infer<typeof TodoStatusSchema>;

/** A single TodoWrite item as reported by the agent */
export type TaskItem = z.infer<typeof TaskItemSchema>;

/**
 * Last validated baseline of the task list for a project.
 * `taskIds` is always exactly the identifiers extractable from `todos`.
 */
export type CanonicalSnapshot = z.infer<typeof CanonicalSnapshotSchema>;

/** Options recorded alongside the items when a snapshot is written */
export interface SnapshotMetadata {
  /** SPEC file the task list was generated from, relative to the project */
  specFile?: string | null;
  /** Exact item count the expectation gate enforced on the bootstrap write */
  expectedCount?: number | null;
}

// ========== Checkpoint Types ==========

export type CheckpointStatus = z.infer<typeof CheckpointStatusSchema>;
export type CompletedItem = z.infer<typeof CompletedItemSchema>;
export type FailedItem = z.infer<typeof FailedItemSchema>;

/** Durable progress cursor and append-only ledgers for one per-item loop */
export type Checkpoint = z.infer<typeof CheckpointSchema>;

// ========== SPEC Document Types ==========

export type SpecTask = z.infer<typeof SpecTaskSchema>;
export type SpecPhase = z.infer<typeof SpecPhaseSchema>;
export type SpecDocument = z.infer<typeof SpecDocumentSchema>;

/** Result of counting the tasks of a SPEC file */
export interface SpecTaskCount {
  count: number;
  /** Task ids in document order */
  taskIds: string[];
  /** `id: description` lines for verbose listings */
  tasks: string[];
}

// ========== Guard Errors ==========

/** A canonical id is neither present in the new write nor covered by a collapse */
export interface TaskRemovalError {
  kind: 'task_removal';
  /** Missing ids in phase order */
  missingIds: string[];
  canonicalCount: number;
  actualCount: number;
}

/** Item count dropped and the write declares no collapsed phase */
export interface UnexplainedShrinkError {
  kind: 'unexplained_shrink';
  canonicalCount: number;
  actualCount: number;
}

/** The expectation artifact demands an exact count the write does not have */
export interface CountMismatchError {
  kind: 'count_mismatch';
  expected: number;
  actual: number;
}

/** The canonical snapshot on disk cannot be read or fails validation */
export interface MalformedCanonicalError {
  kind: 'malformed_canonical';
  path: string;
  detail: string;
}

/** The hook event itself cannot be parsed */
export interface MalformedInputError {
  kind: 'malformed_input';
  detail: string;
}

/** Every reason a TodoWrite can be blocked */
export type GuardError =
  | TaskRemovalError
  | UnexplainedShrinkError
  | CountMismatchError
  | MalformedCanonicalError
  | MalformedInputError;

// ========== Engine Results ==========

/**
 * Outcome of reconciling a write against the canonical.
 * - `replace`: zero id overlap, the write starts an unrelated task context
 * - `allow`: every canonical id is covered
 * - `block`: tasks were lost
 */
export type ReconcileResult =
  | { outcome: 'replace' }
  | { outcome: 'allow'; collapsedPhases: string[] }
  | { outcome: 'block'; error: TaskRemovalError | UnexplainedShrinkError };

/** Outcome of the expected-count precondition */
export type GateResult =
  | { outcome: 'not_applicable' }
  | { outcome: 'block'; error: CountMismatchError }
  | { outcome: 'bootstrap'; expectedCount: number };

/** Result of reading the canonical snapshot from durable storage */
export type CanonicalLoadResult =
  | { kind: 'missing' }
  | { kind: 'ok'; snapshot: CanonicalSnapshot }
  | { kind: 'corrupt'; error: MalformedCanonicalError };

/** Diagnostic status attached to an allowed write */
export type AllowStatus =
  | 'canonical_created'
  | 'canonical_created_implicit'
  | 'canonical_replaced'
  | 'validated';

/**
 * Decision for one hook event. Only `block` produces output on stdout; `allow` is
 * reported on the diagnostic channel and `pass` produces nothing.
 */
export type HookDecision =
  | { kind: 'pass' }
  | { kind: 'allow'; status: AllowStatus; taskCount: number; canonicalCount: number | null }
  | { kind: 'block'; error: GuardError; reason: string };

/** Decision returned to Claude Code's Stop hook */
export type StopDecision =
  | { decision: 'approve' }
  | { decision: 'block'; reason: string };

// ========== Error Handling Utilities ==========

/**
 * Type guard to check if a value is an Error instance
 * @param value The value to check
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @example
 * ```typescript
 * try {
 *   store.complete('catalog', 3);
 * } catch (err) {
 *   console.error('Failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
