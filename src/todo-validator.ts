/**
 * @fileoverview PostToolUse validation of TodoWrite events.
 *
 * Flow per event:
 * ```
 * parse event ─(not TodoWrite / no todos)─> pass
 *     │
 *     ├─ expectation gate ─ mismatch ─> block (expectation kept)
 *     │        └─ match ─> consume expectation, save canonical with expectedCount, allow
 *     │
 *     ├─ load canonical ─ missing ─> save as canonical (implicit bootstrap), allow
 *     │        └─ corrupt ─> block
 *     │
 *     └─ reconcile ─ block ─> block
 *              └─ allow / replace ─> save as canonical, allow
 * ```
 *
 * Only a block produces a stdout record. Everything else is reported on stderr, which Claude
 * Code shows in verbose mode and which callers must not treat as a decision.
 *
 * @module todo-validator
 */

import { CanonicalStore } from './canonical-store.js';
import { DEFAULT_HOOK_COMMAND, TODO_TOOL_NAME } from './config/guard-config.js';
import { checkGate, type ExpectationSlot } from './expected-count-gate.js';
import { reconcile } from './reconciliation.js';
import { HookEventSchema, TodoWriteInputSchema } from './schemas.js';
import type {
  AllowStatus,
  CanonicalSnapshot,
  GuardError,
  HookDecision,
  SnapshotMetadata,
  TaskItem,
} from './types.js';
import { getErrorMessage } from './types.js';

export interface TodoValidatorOptions {
  /** The single outstanding-expectation slot */
  expectations: ExpectationSlot;
  /** Project used when an event carries no `cwd` */
  defaultProjectDir: string;
  /** Command name used in recovery instructions */
  command?: string;
}

/** Context the block messages refer to */
export interface ReasonContext {
  command: string;
  specFile: string | null;
  canonicalPath: string;
}

const RULE = '===============================';

/**
 * Renders the instruction text returned to the agent for a blocked write.
 */
export function formatBlockReason(error: GuardError, context: ReasonContext): string {
  switch (error.kind) {
    case 'count_mismatch':
      return [
        '=== TODO COUNT VALIDATION FAILED ===',
        `Expected: ${error.expected} items`,
        `Actual: ${error.actual} items`,
        '',
        `You MUST recreate the TODO with EXACTLY ${error.expected} items.`,
        'Each logical task must be a separate item. Do NOT group tasks.',
        'Do NOT proceed until counts match.',
        '=====================================',
      ].join('\n');

    case 'task_removal':
    case 'unexplained_shrink': {
      const summary =
        error.kind === 'task_removal'
          ? `Task removal not allowed. Missing: ${error.missingIds.join(', ')}`
          : `TODO count decreased from ${error.canonicalCount} to ${error.actualCount} without proper phase collapse`;
      const spec = context.specFile ?? 'SPEC.json';
      return [
        '=== TODO VALIDATION FAILED ===',
        '',
        summary,
        '',
        `Original task count: ${error.canonicalCount}`,
        `Current task count: ${error.actualCount}`,
        '',
        'TO RECOVER, regenerate the TODO from SPEC:',
        '',
        `  ${context.command} todo generate --spec ${spec} --base --format json`,
        '',
        '  # or read the canonical directly',
        `  cat ${context.canonicalPath}`,
        '',
        'Then recreate TodoWrite with ALL original task IDs.',
        RULE,
      ].join('\n');
    }

    case 'malformed_canonical':
      return [
        '=== TODO CANONICAL UNREADABLE ===',
        '',
        error.detail,
        '',
        'The stored baseline cannot be trusted and will not be repaired automatically.',
        'Regenerate the TODO from the SPEC, then reset the baseline with:',
        '',
        `  ${context.command} canonical clear`,
        RULE,
      ].join('\n');

    case 'malformed_input':
      return error.detail;
  }
}

/**
 * Validates TodoWrite hook events against the expectation slot and the canonical snapshot
 * of the event's project.
 */
export class TodoValidator {
  private readonly command: string;

  constructor(private readonly options: TodoValidatorOptions) {
    this.command = options.command ?? DEFAULT_HOOK_COMMAND;
  }

  /** Validates the raw JSON text a hook receives on stdin. */
  validateRaw(input: string): HookDecision {
    let event: unknown;
    try {
      event = JSON.parse(input);
    } catch (err) {
      return this.malformedInput(`Invalid hook input JSON: ${getErrorMessage(err)}`);
    }
    return this.validate(event);
  }

  /** Validates an already-decoded hook event. */
  validate(event: unknown): HookDecision {
    const envelope = HookEventSchema.safeParse(event);
    if (!envelope.success) {
      return this.malformedInput(`Hook event is not an object with a tool_name: ${envelope.error.issues[0]?.message ?? 'invalid'}`);
    }
    if (envelope.data.tool_name !== TODO_TOOL_NAME) {
      return { kind: 'pass' };
    }

    const input = TodoWriteInputSchema.safeParse(envelope.data.tool_input ?? {});
    if (!input.success) {
      const issue = input.error.issues[0];
      const where = issue ? ` at tool_input.${issue.path.join('.')}` : '';
      return this.malformedInput(`Malformed TodoWrite input${where}: ${issue?.message ?? 'invalid'}`);
    }
    if (input.data.todos.length === 0) {
      return { kind: 'pass' };
    }

    const projectDir = envelope.data.cwd || this.options.defaultProjectDir;
    return this.validateTodos(input.data.todos, projectDir);
  }

  /** Runs the gate and reconciliation for one write to a project. */
  validateTodos(todos: readonly TaskItem[], projectDir: string): HookDecision {
    const store = new CanonicalStore(projectDir);

    const gate = checkGate(todos, this.options.expectations);
    if (gate.outcome === 'block') {
      return this.block(gate.error, store, null);
    }
    if (gate.outcome === 'bootstrap') {
      this.persist(store, todos, { expectedCount: gate.expectedCount });
      return this.allow('canonical_created', todos, null);
    }

    const loaded = store.load();
    if (loaded.kind === 'corrupt') {
      return this.block(loaded.error, store, null);
    }
    if (loaded.kind === 'missing') {
      this.persist(store, todos, {});
      return this.allow('canonical_created_implicit', todos, null);
    }

    const canonical = loaded.snapshot;
    const result = reconcile(todos, canonical);
    switch (result.outcome) {
      case 'block':
        return this.block(result.error, store, canonical);
      case 'replace':
        this.persist(store, todos, {});
        return this.allow('canonical_replaced', todos, canonical.taskCount);
      case 'allow':
        this.persist(store, todos, {
          specFile: canonical.specFile ?? undefined,
          expectedCount: canonical.expectedCount,
        });
        return this.allow('validated', todos, canonical.taskCount);
    }
  }

  private persist(store: CanonicalStore, todos: readonly TaskItem[], metadata: SnapshotMetadata): void {
    try {
      store.save(todos, metadata);
    } catch (err) {
      console.warn(`[TodoValidator] Failed to save canonical ${store.filePath}: ${getErrorMessage(err)}`);
    }
  }

  private allow(status: AllowStatus, todos: readonly TaskItem[], canonicalCount: number | null): HookDecision {
    return { kind: 'allow', status, taskCount: todos.length, canonicalCount };
  }

  private block(error: GuardError, store: CanonicalStore, canonical: CanonicalSnapshot | null): HookDecision {
    const reason = formatBlockReason(error, {
      command: this.command,
      specFile: canonical?.specFile ?? null,
      canonicalPath: store.filePath,
    });
    return { kind: 'block', error, reason };
  }

  private malformedInput(detail: string): HookDecision {
    const error: GuardError = { kind: 'malformed_input', detail };
    return { kind: 'block', error, reason: detail };
  }
}

/** What a hook process writes for a decision */
export interface HookOutput {
  stdout: string | null;
  stderr: string | null;
}

/**
 * Serializes a decision the way Claude Code reads it: a block record on stdout, an
 * informational status record on stderr, or nothing.
 */
export function toHookOutput(decision: HookDecision): HookOutput {
  switch (decision.kind) {
    case 'pass':
      return { stdout: null, stderr: null };
    case 'block':
      return { stdout: JSON.stringify({ decision: 'block', reason: decision.reason }), stderr: null };
    case 'allow':
      return {
        stdout: null,
        stderr: JSON.stringify({
          status: decision.status,
          task_count: decision.taskCount,
          ...(decision.canonicalCount !== null ? { canonical_count: decision.canonicalCount } : {}),
        }),
      };
  }
}
