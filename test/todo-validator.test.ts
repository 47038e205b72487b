/**
 * @fileoverview Tests for TodoWrite hook validation
 *
 * Exercises the full path from raw hook input to decision: expectation gate, canonical
 * bootstrap, reconciliation and the messages returned to the agent.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { CanonicalStore } from '../src/canonical-store.js';
import { FileExpectationSlot } from '../src/expected-count-gate.js';
import { formatBlockReason, TodoValidator, toHookOutput } from '../src/todo-validator.js';
import type { HookDecision, TaskItem } from '../src/types.js';

const todo = (content: string, status: TaskItem['status'] = 'pending'): TaskItem => ({ content, status });

function todoWrite(todos: unknown, cwd?: string): string {
  return JSON.stringify({
    session_id: 'test-session',
    hook_event_name: 'PostToolUse',
    tool_name: 'TodoWrite',
    ...(cwd ? { cwd } : {}),
    tool_input: { todos },
  });
}

function reasonOf(decision: HookDecision): string {
  return decision.kind === 'block' ? decision.reason : '';
}

describe('TodoValidator', () => {
  let projectDir: string;
  let slotDir: string;
  let slot: FileExpectationSlot;
  let validator: TodoValidator;
  let canonical: CanonicalStore;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'validator-project-'));
    slotDir = mkdtempSync(join(tmpdir(), 'validator-slot-'));
    slot = new FileExpectationSlot(join(slotDir, 'expected-count'));
    validator = new TodoValidator({ expectations: slot, defaultProjectDir: projectDir });
    canonical = new CanonicalStore(projectDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(projectDir, { recursive: true, force: true });
    rmSync(slotDir, { recursive: true, force: true });
  });

  describe('input handling', () => {
    it('should pass events for other tools', () => {
      const input = JSON.stringify({ tool_name: 'Bash', tool_input: { command: 'ls' } });
      expect(validator.validateRaw(input)).toEqual({ kind: 'pass' });
    });

    it('should pass events without a tool name', () => {
      expect(validator.validate({})).toEqual({ kind: 'pass' });
    });

    it('should pass an empty todo list', () => {
      expect(validator.validateRaw(todoWrite([]))).toEqual({ kind: 'pass' });
      expect(canonical.load()).toEqual({ kind: 'missing' });
    });

    it('should pass a TodoWrite without todos', () => {
      expect(validator.validate({ tool_name: 'TodoWrite', tool_input: {} })).toEqual({ kind: 'pass' });
    });

    it('should block input that is not JSON', () => {
      const decision = validator.validateRaw('{"tool_name": ');
      expect(decision.kind).toBe('block');
      expect(decision.kind === 'block' && decision.error.kind).toBe('malformed_input');
      expect(reasonOf(decision)).toMatch(/^Invalid hook input JSON: /);
    });

    it('should block an event that is not an object', () => {
      const decision = validator.validate(42);
      expect(decision.kind === 'block' && decision.error.kind).toBe('malformed_input');
    });

    it('should block todos that are not a list', () => {
      const decision = validator.validateRaw(todoWrite('0.1: Check env'));
      expect(reasonOf(decision)).toBe('Malformed TodoWrite input at tool_input.todos: Expected array, received string');
    });

    it('should block items with an unknown status', () => {
      const decision = validator.validateRaw(todoWrite([{ content: '0.1: Check env', status: 'done' }]));
      expect(decision.kind === 'block' && decision.error.kind).toBe('malformed_input');
      expect(reasonOf(decision)).toMatch(/^Malformed TodoWrite input at tool_input\.todos\.0\.status: /);
    });
  });

  describe('without an expectation', () => {
    it('should make the first write the canonical', () => {
      const decision = validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('0.2: Install'), todo('1.1: Scan')]));
      expect(decision).toEqual({ kind: 'allow', status: 'canonical_created_implicit', taskCount: 3, canonicalCount: null });

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.taskIds).toEqual(['0.1', '0.2', '1.1']);
      expect(loaded.kind === 'ok' && loaded.snapshot.expectedCount).toBeNull();
    });

    it('should allow status changes', () => {
      validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('0.2: Install'), todo('1.1: Scan')]));
      const decision = validator.validateRaw(
        todoWrite([todo('0.1: Check env', 'completed'), todo('0.2: Install', 'in_progress'), todo('1.1: Scan')]),
      );
      expect(decision).toEqual({ kind: 'allow', status: 'validated', taskCount: 3, canonicalCount: 3 });

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.todos[0]?.status).toBe('completed');
    });

    it('should block a removed task and keep the canonical', () => {
      validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('0.2: Install'), todo('1.1: Scan')]));
      const decision = validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('1.1: Scan')]));

      expect(decision.kind === 'block' && decision.error).toEqual({
        kind: 'task_removal',
        missingIds: ['0.2'],
        canonicalCount: 3,
        actualCount: 2,
      });
      const lines = reasonOf(decision).split('\n');
      expect(lines[0]).toBe('=== TODO VALIDATION FAILED ===');
      expect(lines).toContain('Task removal not allowed. Missing: 0.2');
      expect(lines).toContain('  spec-guard todo generate --spec SPEC.json --base --format json');
      expect(lines).toContain(`  cat ${canonical.filePath}`);

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.taskCount).toBe(3);
    });

    it('should name the SPEC the canonical was taken from', () => {
      writeFileSync(join(projectDir, 'SPEC.json'), '{"phases":[]}');
      validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('0.2: Install')]));
      const decision = new TodoValidator({
        expectations: slot,
        defaultProjectDir: projectDir,
        command: 'npx spec-guard',
      }).validateRaw(todoWrite([todo('0.1: Check env')]));
      expect(reasonOf(decision).split('\n')).toContain(
        '  npx spec-guard todo generate --spec SPEC.json --base --format json',
      );
    });

    it('should accept a collapsed phase and save the new list', () => {
      validator.validateRaw(
        todoWrite([todo('0.1: A'), todo('0.2: B'), todo('0.3: C'), todo('1.1: D'), todo('1.2: E')]),
      );
      const decision = validator.validateRaw(
        todoWrite([todo('0.x: Pre-Flight (3/3) ✓', 'completed'), todo('1.1: D'), todo('1.2: E')]),
      );
      expect(decision).toEqual({ kind: 'allow', status: 'validated', taskCount: 3, canonicalCount: 5 });

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.taskIds).toEqual(['0.x', '1.1', '1.2']);
    });

    it('should block a shrink without a collapse', () => {
      validator.validateRaw(todoWrite([todo('Write docs'), todo('Ship it'), todo('Celebrate')]));
      const decision = validator.validateRaw(todoWrite([todo('Write docs'), todo('Ship it')]));
      expect(reasonOf(decision).split('\n')).toContain(
        'TODO count decreased from 3 to 2 without proper phase collapse',
      );
    });

    it('should replace the canonical on a fresh start', () => {
      validator.validateRaw(todoWrite([todo('0.1: Check env'), todo('0.2: Install'), todo('1.1: Scan')]));
      const decision = validator.validateRaw(todoWrite([todo('8.1: New plan')]));
      expect(decision).toEqual({ kind: 'allow', status: 'canonical_replaced', taskCount: 1, canonicalCount: 3 });

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.taskIds).toEqual(['8.1']);
    });

    it('should block while the canonical is corrupt', () => {
      mkdirSync(dirname(canonical.filePath), { recursive: true });
      writeFileSync(canonical.filePath, 'not json');
      const decision = validator.validateRaw(todoWrite([todo('0.1: Check env')]));

      expect(decision.kind === 'block' && decision.error.kind).toBe('malformed_canonical');
      const lines = reasonOf(decision).split('\n');
      expect(lines[0]).toBe('=== TODO CANONICAL UNREADABLE ===');
      expect(lines).toContain('  spec-guard canonical clear');
    });

    it('should validate against the project named by the event', () => {
      const otherDir = mkdtempSync(join(tmpdir(), 'validator-other-'));
      try {
        validator.validateRaw(todoWrite([todo('0.1: Check env')], otherDir));
        expect(new CanonicalStore(otherDir).load().kind).toBe('ok');
        expect(canonical.load()).toEqual({ kind: 'missing' });
      } finally {
        rmSync(otherDir, { recursive: true, force: true });
      }
    });
  });

  describe('with an expectation', () => {
    it('should block a mismatched count and keep the expectation', () => {
      slot.write(5);
      const decision = validator.validateRaw(todoWrite([todo('0.1: A'), todo('0.2: B'), todo('0.3: C')]));

      expect(decision.kind === 'block' && decision.error).toEqual({ kind: 'count_mismatch', expected: 5, actual: 3 });
      const lines = reasonOf(decision).split('\n');
      expect(lines.slice(0, 3)).toEqual(['=== TODO COUNT VALIDATION FAILED ===', 'Expected: 5 items', 'Actual: 3 items']);
      expect(existsSync(slot.location)).toBe(true);
      expect(canonical.load()).toEqual({ kind: 'missing' });
    });

    it('should block a mismatched count even when the write would reconcile', () => {
      validator.validateRaw(todoWrite([todo('0.1: A'), todo('0.2: B')]));
      const before = readFileSync(canonical.filePath, 'utf-8');
      slot.write(5);
      const decision = validator.validateRaw(todoWrite([todo('0.1: A', 'completed'), todo('0.2: B')]));

      expect(decision.kind === 'block' && decision.error).toEqual({ kind: 'count_mismatch', expected: 5, actual: 2 });
      expect(readFileSync(canonical.filePath, 'utf-8')).toBe(before);
      expect(existsSync(slot.location)).toBe(true);
    });

    it('should report a mismatched count before a corrupt canonical', () => {
      mkdirSync(dirname(canonical.filePath), { recursive: true });
      writeFileSync(canonical.filePath, 'not json');
      slot.write(3);
      const decision = validator.validateRaw(todoWrite([todo('0.1: A')]));

      expect(decision.kind === 'block' && decision.error).toEqual({ kind: 'count_mismatch', expected: 3, actual: 1 });
      expect(readFileSync(canonical.filePath, 'utf-8')).toBe('not json');
      expect(existsSync(slot.location)).toBe(true);
    });

    it('should bootstrap the canonical on an exact match', () => {
      slot.write(2);
      const decision = validator.validateRaw(todoWrite([todo('0.1: A'), todo('0.2: B')]));

      expect(decision).toEqual({ kind: 'allow', status: 'canonical_created', taskCount: 2, canonicalCount: null });
      expect(existsSync(slot.location)).toBe(false);
      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.expectedCount).toBe(2);
    });

    it('should bootstrap over an existing canonical', () => {
      validator.validateRaw(todoWrite([todo('0.1: Old'), todo('0.2: Old'), todo('0.3: Old')]));
      slot.write(1);
      const decision = validator.validateRaw(todoWrite([todo('0.1: Fresh')]));
      expect(decision.kind === 'allow' && decision.status).toBe('canonical_created');
    });

    it('should keep the expected count across validated writes', () => {
      slot.write(2);
      validator.validateRaw(todoWrite([todo('0.1: A'), todo('0.2: B')]));
      validator.validateRaw(todoWrite([todo('0.1: A', 'completed'), todo('0.2: B')]));

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.expectedCount).toBe(2);
    });

    it('should drop the expected count on a fresh start', () => {
      slot.write(2);
      validator.validateRaw(todoWrite([todo('0.1: A'), todo('0.2: B')]));
      validator.validateRaw(todoWrite([todo('4.1: Elsewhere')]));

      const loaded = canonical.load();
      expect(loaded.kind === 'ok' && loaded.snapshot.expectedCount).toBeNull();
    });
  });
});

describe('formatBlockReason', () => {
  it('should render the count mismatch instructions', () => {
    const reason = formatBlockReason(
      { kind: 'count_mismatch', expected: 12, actual: 9 },
      { command: 'spec-guard', specFile: null, canonicalPath: '/p/.state/todo-canonical.json' },
    );
    expect(reason).toBe(
      [
        '=== TODO COUNT VALIDATION FAILED ===',
        'Expected: 12 items',
        'Actual: 9 items',
        '',
        'You MUST recreate the TODO with EXACTLY 12 items.',
        'Each logical task must be a separate item. Do NOT group tasks.',
        'Do NOT proceed until counts match.',
        '=====================================',
      ].join('\n'),
    );
  });

  it('should return malformed input details as-is', () => {
    const reason = formatBlockReason(
      { kind: 'malformed_input', detail: 'bad input' },
      { command: 'spec-guard', specFile: null, canonicalPath: '/p' },
    );
    expect(reason).toBe('bad input');
  });
});

describe('toHookOutput', () => {
  it('should print nothing for a pass', () => {
    expect(toHookOutput({ kind: 'pass' })).toEqual({ stdout: null, stderr: null });
  });

  it('should print a block decision on stdout', () => {
    const output = toHookOutput({
      kind: 'block',
      error: { kind: 'malformed_input', detail: 'oops' },
      reason: 'oops',
    });
    expect(output).toEqual({ stdout: '{"decision":"block","reason":"oops"}', stderr: null });
  });

  it('should print an allow status on stderr', () => {
    expect(toHookOutput({ kind: 'allow', status: 'validated', taskCount: 4, canonicalCount: 5 })).toEqual({
      stdout: null,
      stderr: '{"status":"validated","task_count":4,"canonical_count":5}',
    });
  });

  it('should omit the canonical count when there was no baseline', () => {
    expect(toHookOutput({ kind: 'allow', status: 'canonical_created', taskCount: 4, canonicalCount: null })).toEqual({
      stdout: null,
      stderr: '{"status":"canonical_created","task_count":4}',
    });
  });
});
