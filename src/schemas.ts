/**
 * @fileoverview zod schemas for every record that crosses a process or file boundary:
 * hook events from Claude Code, the canonical snapshot, checkpoints and SPEC documents.
 *
 * Durable records use `null` for an absent optional value so that a missing field on disk
 * is a schema error rather than a silent default.
 *
 * @module schemas
 */

import { z } from 'zod';

// ========== Task Items ==========

export const TodoStatusSchema = z.enum(['pending', 'in_progress', 'completed']);

/**
 * One TodoWrite entry. `activeForm` is the display form Claude shows while the item is
 * in progress; the guard never reads it, so it is optional.
 */
export const TaskItemSchema = z.object({
  content: z.string(),
  status: TodoStatusSchema,
  activeForm: z.string().optional(),
});

export const TodoWriteInputSchema = z.object({
  todos: z.array(TaskItemSchema).default([]),
});

// ========== Hook Events ==========

/**
 * Outer envelope of a hook event. `tool_input` stays opaque here because its shape
 * depends on the tool; only TodoWrite inputs are parsed further.
 */
export const HookEventSchema = z.object({
  tool_name: z.string().default(''),
  cwd: z.string().optional(),
  session_id: z.string().optional(),
  hook_event_name: z.string().optional(),
  tool_input: z.unknown().optional(),
});

export const StopEventSchema = z.object({
  cwd: z.string().optional(),
});

// ========== Canonical Snapshot ==========

export const CanonicalSnapshotSchema = z.object({
  createdAt: z.string(),
  specFile: z.string().nullable(),
  expectedCount: z.number().int().nonnegative().nullable(),
  taskCount: z.number().int().nonnegative(),
  taskIds: z.array(z.string()),
  todos: z.array(TaskItemSchema),
});

// ========== Checkpoints ==========

export const CheckpointStatusSchema = z.enum(['in_progress', 'completed']);

export const CompletedItemSchema = z.object({
  index: z.number().int().nonnegative(),
  itemId: z.string().nullable(),
  completedAt: z.string(),
});

export const FailedItemSchema = z.object({
  index: z.number().int().nonnegative(),
  itemId: z.string().nullable(),
  failedAt: z.string(),
  reason: z.string(),
});

export const CheckpointSchema = z.object({
  specName: z.string(),
  specFile: z.string().nullable(),
  loopPhase: z.string(),
  startedAt: z.string(),
  lastUpdated: z.string(),
  totalItems: z.number().int().nonnegative(),
  currentIndex: z.number().int().nonnegative(),
  currentItemId: z.string().nullable(),
  currentItemName: z.string().nullable(),
  currentTask: z.string().nullable(),
  completedItems: z.array(CompletedItemSchema),
  failedItems: z.array(FailedItemSchema),
  status: CheckpointStatusSchema,
});

// ========== SPEC Documents ==========

export const SpecTaskSchema = z.object({
  id: z.string().default(''),
  task: z.string().default(''),
});

export const SpecPhaseSchema = z.object({
  id: z.string().default(''),
  name: z.string().default('Unnamed Phase'),
  tasks: z.array(SpecTaskSchema).default([]),
  loop: z
    .object({
      tasks: z.array(SpecTaskSchema).default([]),
    })
    .optional(),
});

export const SpecDocumentSchema = z.object({
  phases: z.array(SpecPhaseSchema).default([]),
});
