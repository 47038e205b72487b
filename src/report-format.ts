/**
 * @fileoverview Plain-text reports printed by the CLI.
 *
 * Kept free of colour codes so the same text can be asserted in tests and piped into logs.
 *
 * @module report-format
 */

import { LARGE_SPEC_TASK_THRESHOLD } from './config/guard-config.js';
import type { CanonicalSnapshot, Checkpoint, ReconcileResult, SpecTaskCount } from './types.js';

const WIDE_RULE = '='.repeat(50);

/** Status block shown by `checkpoint read`. */
export function formatCheckpointSummary(checkpoint: Checkpoint): string {
  const lines = [
    WIDE_RULE,
    `CHECKPOINT: ${checkpoint.specName}`,
    WIDE_RULE,
    `Status: ${checkpoint.status}`,
    `Progress: ${checkpoint.completedItems.length}/${checkpoint.totalItems} completed`,
    `Current index: ${checkpoint.currentIndex}`,
    `Current item: ${checkpoint.currentItemName ?? checkpoint.currentItemId ?? 'N/A'}`,
    `Current task: ${checkpoint.currentTask ?? 'N/A'}`,
    `Last updated: ${checkpoint.lastUpdated}`,
    WIDE_RULE,
  ];

  if (checkpoint.failedItems.length > 0) {
    lines.push('', `Failed items (${checkpoint.failedItems.length}):`);
    for (const item of checkpoint.failedItems) {
      const id = item.itemId ? ` ${item.itemId}` : '';
      const reason = item.reason ? `: ${item.reason}` : '';
      lines.push(`  - #${item.index}${id}${reason}`);
    }
  }
  return lines.join('\n');
}

/** Summary shown by `canonical show`. */
export function formatCanonicalSummary(snapshot: CanonicalSnapshot, path: string): string {
  return [
    `Canonical: ${path}`,
    `Created: ${snapshot.createdAt}`,
    `SPEC file: ${snapshot.specFile ?? 'N/A'}`,
    `Expected count: ${snapshot.expectedCount ?? 'N/A'}`,
    `Items: ${snapshot.taskCount}`,
    `Task ids (${snapshot.taskIds.length}): ${snapshot.taskIds.join(', ')}`,
  ].join('\n');
}

/** One-line verdict of a `canonical check` dry run. */
export function formatReconcileResult(result: ReconcileResult): string {
  switch (result.outcome) {
    case 'replace':
      return 'REPLACE: no task ids in common with the canonical, the write starts a new baseline';
    case 'allow':
      return result.collapsedPhases.length > 0
        ? `ALLOW: all canonical tasks covered (collapsed phases: ${result.collapsedPhases.join(', ')})`
        : 'ALLOW: all canonical tasks present';
    case 'block':
      return result.error.kind === 'task_removal'
        ? `BLOCK: missing ${result.error.missingIds.join(', ')}`
        : `BLOCK: count decreased from ${result.error.canonicalCount} to ${result.error.actualCount} without a collapsed phase`;
  }
}

/** Report printed by `spec count`. */
export function formatSpecCount(fileName: string, result: SpecTaskCount, verbose: boolean): string {
  const lines = [
    WIDE_RULE,
    `SPEC FILE: ${fileName}`,
    WIDE_RULE,
    '',
    `Total tasks: ${result.count}`,
    '',
    `Your TODO must have EXACTLY ${result.count} items.`,
    WIDE_RULE,
  ];

  if (result.count > LARGE_SPEC_TASK_THRESHOLD) {
    lines.push(
      '',
      `WARNING: SPEC has more than ${LARGE_SPEC_TASK_THRESHOLD} tasks!`,
      'Large SPECs risk context overflow while the TODO is created and tasks being',
      'summarized or skipped during execution. Split it into several SPECs of',
      '150-200 tasks each and run them as separate sessions.',
    );
  }

  lines.push('');
  if (verbose) {
    lines.push('All tasks:');
    result.tasks.forEach((task, i) => {
      lines.push(`  ${String(i + 1).padStart(3)}. ${task}`);
    });
  } else {
    lines.push('(Run with -v or --verbose to see all task IDs)');
  }
  return lines.join('\n');
}
