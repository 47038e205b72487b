/**
 * @fileoverview Reconciliation of a TodoWrite against the canonical snapshot.
 *
 * Identifiers, not items, are the unit of continuity. Display text may change freely
 * (progress annotations like `[5/40]`, reworded descriptions, added loop sub-tasks); a write
 * is blocked only when a tracked identifier disappears without a collapse that covers it,
 * or when the list shrinks while declaring no collapse at all.
 *
 * The hook, the `canonical check` dry-run and the tests all go through {@link reconcile}.
 *
 * @module reconciliation
 */

import { collectCollapsedPhases } from './collapse-detector.js';
import { extractTaskIds, phaseOf, sortTaskIds } from './task-id.js';
import type { CanonicalSnapshot, ReconcileResult, TaskItem } from './types.js';

/** The parts of a canonical snapshot reconciliation reads */
export type CanonicalBaseline = Pick<CanonicalSnapshot, 'taskIds' | 'taskCount'>;

/**
 * Decides whether `newItems` may replace the canonical baseline.
 *
 * Order of checks:
 * 1. Fresh start: both id sets are non-empty and disjoint. The write belongs to a new task
 *    context and replaces the canonical wholesale. This precedes collapse handling even when
 *    the write also contains summary items.
 * 2. Coverage: each canonical id must appear verbatim, or its phase must be collapsed by a
 *    summary item, or `<phase>.x` must appear among the new ids.
 * 3. Shrink: fewer items than the canonical count is only accepted with a declared collapse.
 */
export function reconcile(newItems: readonly TaskItem[], canonical: CanonicalBaseline): ReconcileResult {
  const canonicalIds = new Set(canonical.taskIds);
  const newIds = extractTaskIds(newItems);
  const collapsedPhases = collectCollapsedPhases(newItems);

  if (canonicalIds.size > 0 && newIds.size > 0 && !hasOverlap(canonicalIds, newIds)) {
    return { outcome: 'replace' };
  }

  const missing: string[] = [];
  for (const id of canonicalIds) {
    if (newIds.has(id)) continue;
    const phase = phaseOf(id);
    if (phase && (collapsedPhases.has(phase) || newIds.has(`${phase}.x`))) continue;
    missing.push(id);
  }

  if (missing.length > 0) {
    return {
      outcome: 'block',
      error: {
        kind: 'task_removal',
        missingIds: sortTaskIds(missing),
        canonicalCount: canonical.taskCount,
        actualCount: newItems.length,
      },
    };
  }

  if (newItems.length < canonical.taskCount && collapsedPhases.size === 0) {
    return {
      outcome: 'block',
      error: {
        kind: 'unexplained_shrink',
        canonicalCount: canonical.taskCount,
        actualCount: newItems.length,
      },
    };
  }

  return { outcome: 'allow', collapsedPhases: [...collapsedPhases].sort() };
}

function hasOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const id of a) {
    if (b.has(id)) return true;
  }
  return false;
}
