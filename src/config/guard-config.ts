/**
 * @fileoverview Centralized paths, limits and environment lookup for spec-guard.
 *
 * All durable state lives under `<project>/.state/`. The expectation artifact is the one
 * exception: it sits at a single process-wide path so that the command which counts a SPEC
 * and the hook which validates the next TodoWrite agree on it without sharing a project dir.
 *
 * @module config/guard-config
 */

import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

// ============================================================================
// Durable State Layout
// ============================================================================

/** Directory (relative to the project root) that holds all guard state. */
export const STATE_DIR_NAME = '.state';

/** Canonical TODO snapshot file name inside the state directory. */
export const CANONICAL_FILE_NAME = 'todo-canonical.json';

/** Checkpoint directory name inside the state directory. */
export const CHECKPOINT_DIR_NAME = 'checkpoints';

/** Suffix of the human-readable decision log kept next to each checkpoint. */
export const DECISIONS_FILE_SUFFIX = '-decisions.md';

/** Default expectation artifact location. Only one expectation may be outstanding. */
export const DEFAULT_EXPECTATION_FILE = join(tmpdir(), 'claude-expected-todo-count');

// ============================================================================
// Hook Contract
// ============================================================================

/** Tool whose writes are validated. Events for any other tool pass through. */
export const TODO_TOOL_NAME = 'TodoWrite';

/** Timeout given to Claude Code for each hook command (seconds). */
export const HOOK_TIMEOUT_SECONDS = 10;

/** Default binary name written into generated hook commands. */
export const DEFAULT_HOOK_COMMAND = 'spec-guard';

// ============================================================================
// SPEC Execution Limits
// ============================================================================

/** Phase containing the per-item loop when the caller does not name one. */
export const DEFAULT_LOOP_PHASE = 'phase-2';

/** SPECs above this many tasks should be split into several sessions. */
export const LARGE_SPEC_TASK_THRESHOLD = 400;

/** Width of task descriptions in `spec count` listings and loop items. */
export const TASK_SUMMARY_WIDTH = 50;

/** Width of task descriptions in regular rendered TODO items. */
export const TASK_CONTENT_WIDTH = 60;

/** Pending tasks quoted by the stop guard before it summarizes the rest. */
export const STOP_GUARD_EXAMPLES = 3;

/** Truncation width for each quoted pending task. */
export const STOP_GUARD_EXAMPLE_WIDTH = 40;

// ============================================================================
// Resolution
// ============================================================================

export interface GuardConfig {
  /** Absolute project root all `.state` paths hang off */
  projectDir: string;
  /** Absolute path of the expectation artifact */
  expectationFile: string;
}

export interface StatePaths {
  stateDir: string;
  canonicalFile: string;
  checkpointDir: string;
}

/**
 * Resolves the project directory and expectation path.
 *
 * Precedence for the project: explicit option, `CLAUDE_PROJECT_DIR`, then the process cwd.
 * `SPEC_GUARD_EXPECTATION_FILE` relocates the expectation artifact.
 */
export function resolveGuardConfig(
  options: { projectDir?: string } = {},
  env: NodeJS.ProcessEnv = process.env,
): GuardConfig {
  const projectDir = options.projectDir || env.CLAUDE_PROJECT_DIR || process.cwd();
  return {
    projectDir: resolve(projectDir),
    expectationFile: env.SPEC_GUARD_EXPECTATION_FILE || DEFAULT_EXPECTATION_FILE,
  };
}

export function resolveStatePaths(projectDir: string): StatePaths {
  const stateDir = join(projectDir, STATE_DIR_NAME);
  return {
    stateDir,
    canonicalFile: join(stateDir, CANONICAL_FILE_NAME),
    checkpointDir: join(stateDir, CHECKPOINT_DIR_NAME),
  };
}
