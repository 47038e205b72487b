/**
 * @fileoverview Detection of phase-summary items.
 *
 * Once a phase is finished the agent may replace its individual tasks with one summary
 * item, e.g. `0.x: Pre-Flight completed ✓` or `2.loop: Process items (5/40)`. Such an item
 * covers every canonical task of its phase.
 *
 * @module collapse-detector
 */

import { extractTaskId, phaseOf } from './task-id.js';
import type { TaskItem } from './types.js';

const COMPLETION_GLYPH = '✓';

/** Whether the item content declares a collapsed phase. */
export function isCollapsedPhase(content: string): boolean {
  const lower = content.trim().toLowerCase();
  if (lower.includes('.x:') || lower.includes('.loop:')) {
    return true;
  }
  return lower.includes('completed') && lower.includes(COMPLETION_GLYPH);
}

/**
 * Phases declared collapsed by the items. A summary item without an identifier, or whose
 * identifier has no phase, declares nothing.
 */
export function collectCollapsedPhases(items: readonly TaskItem[]): Set<string> {
  const phases = new Set<string>();
  for (const item of items) {
    if (!isCollapsedPhase(item.content)) continue;
    const taskId = extractTaskId(item.content);
    if (!taskId) continue;
    const phase = phaseOf(taskId);
    if (phase) phases.add(phase);
  }
  return phases;
}
