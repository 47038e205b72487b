/**
 * @fileoverview Task identifier grammar.
 *
 * A TodoWrite item carries its identifier as the prefix before the first colon:
 *
 * ```
 * "0.1: Verify environment"          -> "0.1"
 * "  2.3: [5/40] Process item"       -> "2.3"
 * "1.x: Discovery (5/5) ✓"           -> "1.x"
 * "phase-2: Loop (5/40)"             -> "phase-2"
 * "Write the changelog"              -> null
 * ```
 *
 * A prefix is an identifier when it contains a `.`, starts with `phase-`, or starts with a
 * digit. Items without one are invisible to reconciliation.
 *
 * @module task-id
 */

import type { TaskItem } from './types.js';

const PHASE_PREFIX = 'phase-';
const DIGITS_ONLY = /^\d+$/;
/** Sort key for phases that are not purely numeric */
const NON_NUMERIC_PHASE_RANK = 999;

/**
 * Extracts the task identifier from item content.
 * @returns The identifier, or null when the content has none
 */
export function extractTaskId(content: string): string | null {
  const trimmed = content.trim();
  const colon = trimmed.indexOf(':');
  if (colon === -1) return null;

  const prefix = trimmed.slice(0, colon).trim();
  if (!prefix) return null;

  if (prefix.includes('.') || prefix.startsWith(PHASE_PREFIX) || /^\d/.test(prefix)) {
    return prefix;
  }
  return null;
}

/**
 * Returns the phase an identifier belongs to: the part before the first `.`, or `N` for
 * `phase-N`. Identifiers such as `7` have no phase.
 */
export function phaseOf(taskId: string): string | null {
  const dot = taskId.indexOf('.');
  if (dot !== -1) return taskId.slice(0, dot);
  if (taskId.startsWith(PHASE_PREFIX)) return taskId.slice(PHASE_PREFIX.length);
  return null;
}

/** Collects the identifiers of all items that have one. */
export function extractTaskIds(items: readonly TaskItem[]): Set<string> {
  const ids = new Set<string>();
  for (const item of items) {
    const id = extractTaskId(item.content);
    if (id) ids.add(id);
  }
  return ids;
}

function phaseRank(taskId: string): number {
  const head = taskId.split('.')[0];
  return DIGITS_ONLY.test(head) ? parseInt(head, 10) : NON_NUMERIC_PHASE_RANK;
}

/**
 * Orders ids by numeric phase (non-numeric phases last), then by plain string comparison.
 * This is the order used for the persisted id list and for missing-id reports.
 */
export function compareTaskIds(a: string, b: string): number {
  const rankDiff = phaseRank(a) - phaseRank(b);
  if (rankDiff !== 0) return rankDiff;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortTaskIds(ids: Iterable<string>): string[] {
  return [...ids].sort(compareTaskIds);
}

/**
 * Natural ordering of dotted numeric ids, so `1.10` sorts after `1.2`.
 * Non-numeric segments are ignored, which makes `2.x` equal to `2`.
 */
export function compareNaturalIds(a: string, b: string): number {
  const left = numericSegments(a);
  const right = numericSegments(b);
  const len = Math.min(left.length, right.length);
  for (let i = 0; i < len; i++) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return left.length - right.length;
}

function numericSegments(taskId: string): number[] {
  return taskId
    .split('.')
    .filter((part) => DIGITS_ONLY.test(part))
    .map((part) => parseInt(part, 10));
}
