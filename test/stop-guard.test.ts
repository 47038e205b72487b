/**
 * @fileoverview Tests for the Stop hook guard
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { CanonicalStore } from '../src/canonical-store.js';
import { evaluateStop, evaluateStopEvent } from '../src/stop-guard.js';
import type { TaskItem } from '../src/types.js';

const todo = (content: string, status: TaskItem['status'] = 'pending'): TaskItem => ({ content, status });

describe('evaluateStop', () => {
  let projectDir: string;
  let store: CanonicalStore;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'stop-guard-test-'));
    store = new CanonicalStore(projectDir);
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('should approve without a canonical', () => {
    expect(evaluateStop(store)).toEqual({ decision: 'approve' });
  });

  it('should approve outside SPEC mode', () => {
    store.save([todo('0.1: Pending work')], { specFile: null, expectedCount: null });
    expect(evaluateStop(store)).toEqual({ decision: 'approve' });
  });

  it('should approve when every task is completed', () => {
    store.save([todo('0.1: A', 'completed'), todo('0.2: B', 'completed')], { specFile: null, expectedCount: 2 });
    expect(evaluateStop(store)).toEqual({ decision: 'approve' });
  });

  it('should approve with a corrupt canonical', () => {
    mkdirSync(dirname(store.filePath), { recursive: true });
    writeFileSync(store.filePath, '[');
    expect(evaluateStop(store)).toEqual({ decision: 'approve' });
  });

  it('should block with pending tasks in SPEC mode', () => {
    store.save([todo('0.1: Check env', 'completed'), todo('0.2: Install', 'in_progress')], {
      specFile: null,
      expectedCount: 2,
    });
    expect(evaluateStop(store)).toEqual({
      decision: 'block',
      reason:
        '1 tasks still pending: "0.2: Install". Continue execution with the next pending task. ' +
        'If you are blocked or need clarification, use AskUserQuestion.',
    });
  });

  it('should quote three examples and summarize the rest', () => {
    store.save(
      [
        todo('0.1: Check env', 'completed'),
        todo('0.2: Install dependencies for every workspace package'),
        todo('1.1: Scan', 'in_progress'),
        todo('1.2: Report'),
        todo('1.3: Ship'),
        todo('1.4: Rest'),
      ],
      { specFile: null, expectedCount: 6 },
    );
    const decision = evaluateStop(store);
    expect(decision.decision === 'block' && decision.reason).toBe(
      '5 tasks still pending: "0.2: Install dependencies for every work...", "1.1: Scan", "1.2: Report" and 2 more. ' +
        'Continue execution with the next pending task. ' +
        'If you are blocked or need clarification, use AskUserQuestion.',
    );
  });
});

describe('evaluateStopEvent', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = mkdtempSync(join(tmpdir(), 'stop-event-test-'));
    new CanonicalStore(projectDir).save([todo('0.1: Pending')], { specFile: null, expectedCount: 1 });
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  it('should approve input that is not JSON', () => {
    expect(evaluateStopEvent('not json', projectDir)).toEqual({ decision: 'approve' });
  });

  it('should use the event cwd', () => {
    const emptyDir = mkdtempSync(join(tmpdir(), 'stop-event-empty-'));
    try {
      expect(evaluateStopEvent(JSON.stringify({ cwd: projectDir }), emptyDir).decision).toBe('block');
      expect(evaluateStopEvent(JSON.stringify({ cwd: emptyDir }), projectDir).decision).toBe('approve');
    } finally {
      rmSync(emptyDir, { recursive: true, force: true });
    }
  });

  it('should fall back to the default project', () => {
    expect(evaluateStopEvent('{}', projectDir).decision).toBe('block');
  });
});
