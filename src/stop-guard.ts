/**
 * @fileoverview Stop hook: keeps a SPEC run from ending while canonical tasks are pending.
 *
 * Only runs in SPEC mode, i.e. when the canonical was bootstrapped through the expectation
 * gate and therefore carries an `expectedCount`. Ordinary TODO use never blocks a stop. The
 * agent always has a way out: continue with the next task, or ask the user.
 *
 * @module stop-guard
 */

import { CanonicalStore } from './canonical-store.js';
import { STOP_GUARD_EXAMPLES, STOP_GUARD_EXAMPLE_WIDTH } from './config/guard-config.js';
import { StopEventSchema } from './schemas.js';
import type { StopDecision } from './types.js';

function quote(content: string): string {
  return content.length > STOP_GUARD_EXAMPLE_WIDTH
    ? `"${content.slice(0, STOP_GUARD_EXAMPLE_WIDTH)}..."`
    : `"${content}"`;
}

/**
 * Approves unless the canonical is in SPEC mode and has items not yet completed.
 * A missing or unreadable canonical approves.
 */
export function evaluateStop(store: CanonicalStore): StopDecision {
  const loaded = store.load();
  if (loaded.kind !== 'ok' || loaded.snapshot.expectedCount === null) {
    return { decision: 'approve' };
  }

  const pending = loaded.snapshot.todos.filter((t) => t.status !== 'completed').map((t) => t.content);
  if (pending.length === 0) {
    return { decision: 'approve' };
  }

  let examples = pending.slice(0, STOP_GUARD_EXAMPLES).map(quote).join(', ');
  if (pending.length > STOP_GUARD_EXAMPLES) {
    examples += ` and ${pending.length - STOP_GUARD_EXAMPLES} more`;
  }
  return {
    decision: 'block',
    reason:
      `${pending.length} tasks still pending: ${examples}. ` +
      'Continue execution with the next pending task. ' +
      'If you are blocked or need clarification, use AskUserQuestion.',
  };
}

/**
 * Evaluates a raw Stop event for its project (`cwd`, else the default).
 * Unparseable input approves.
 */
export function evaluateStopEvent(input: string, defaultProjectDir: string): StopDecision {
  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch {
    return { decision: 'approve' };
  }
  const parsed = StopEventSchema.safeParse(raw);
  const projectDir = (parsed.success && parsed.data.cwd) || defaultProjectDir;
  return evaluateStop(new CanonicalStore(projectDir));
}
