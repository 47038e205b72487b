/**
 * @fileoverview One-shot exact-count precondition for the first TodoWrite of a SPEC run.
 *
 * Before the agent writes its initial task list, the orchestrator counts the SPEC and
 * stores that number in the expectation slot. The next write must contain exactly that many
 * items. A matching write consumes the slot and becomes the new canonical baseline; a
 * mismatching write is blocked and the slot is kept so the agent can retry.
 *
 * The slot is single-tenant: one outstanding expectation per process environment. It is
 * injected as an {@link ExpectationSlot} so callers and tests choose where it lives.
 *
 * @module expected-count-gate
 */

import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { GateResult, TaskItem } from './types.js';
import { getErrorMessage } from './types.js';

const NON_NEGATIVE_INTEGER = /^\d+$/;

/** Handle on the single outstanding expectation */
export interface ExpectationSlot {
  /** Where the expectation lives, for messages */
  readonly location: string;
  /** The expected count, or null when none is outstanding or it is unreadable */
  read(): number | null;
  /** Stores an expectation, replacing any outstanding one */
  write(count: number): void;
  /** Removes the expectation. Returns false when it could not be removed. */
  consume(): boolean;
}

/**
 * Expectation slot backed by a plain text file holding one integer.
 */
export class FileExpectationSlot implements ExpectationSlot {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  read(): number | null {
    if (!existsSync(this.filePath)) return null;
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf-8').trim();
    } catch (err) {
      console.warn(`[ExpectedCountGate] Could not read ${this.filePath}: ${getErrorMessage(err)}`);
      return null;
    }
    if (!NON_NEGATIVE_INTEGER.test(raw)) {
      console.warn(`[ExpectedCountGate] Ignoring non-numeric expectation in ${this.filePath}: "${raw}"`);
      return null;
    }
    return parseInt(raw, 10);
  }

  write(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new Error(`Expected count must be a non-negative integer, got ${count}`);
    }
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, `${count}\n`, 'utf-8');
  }

  consume(): boolean {
    try {
      if (existsSync(this.filePath)) {
        unlinkSync(this.filePath);
      }
      return true;
    } catch (err) {
      console.warn(`[ExpectedCountGate] Failed to remove ${this.filePath}: ${getErrorMessage(err)}`);
      return false;
    }
  }
}

/**
 * Evaluates the expectation against a write.
 *
 * Strict equality: a write with more items is as wrong as one with fewer, since either
 * means tasks were grouped or invented.
 */
export function checkGate(newItems: readonly TaskItem[], slot: ExpectationSlot): GateResult {
  const expected = slot.read();
  if (expected === null) {
    return { outcome: 'not_applicable' };
  }

  const actual = newItems.length;
  if (actual !== expected) {
    return { outcome: 'block', error: { kind: 'count_mismatch', expected, actual } };
  }

  slot.consume();
  return { outcome: 'bootstrap', expectedCount: expected };
}
