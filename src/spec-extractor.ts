/**
 * @fileoverview SPEC discovery and task counting.
 *
 * A SPEC is either a JSON document (`phases[].tasks[]` and `phases[].loop.tasks[]`, each
 * task carrying an `id` and a `task` description) or a Markdown document whose tasks are
 * `### X.Y` / `#### X.Y` headers or `| X.Y | ... |` table rows. The count drives the
 * expectation gate; the ids let the operator verify the initial TODO by eye.
 *
 * @module spec-extractor
 */

import { existsSync, readdirSync, readFileSync, statSync, type Dirent } from 'node:fs';
import { extname, join, relative } from 'node:path';
import { TASK_SUMMARY_WIDTH } from './config/guard-config.js';
import { SpecDocumentSchema } from './schemas.js';
import type { SpecDocument, SpecPhase, SpecTask, SpecTaskCount } from './types.js';
import { getErrorMessage } from './types.js';

// "#### 1.2 Create schema" or "### 1.2 Create schema"
const MD_HEADER_PATTERN = /#{3,4}\s+(\d+\.\d+)\s+(.+)/g;
// "| 1.2 | Create schema | ... |"
const MD_TABLE_PATTERN = /\|\s*(\d+\.\d+)\s*\|\s*([^|]+)\s*\|/g;
const SPEC_FILE_PATTERN = /^SPEC.*\.json$/;

/** Directories the recursive SPEC search never enters */
const SKIPPED_DIRS = new Set(['node_modules']);

/**
 * Finds the SPEC of a project.
 *
 * Search order: `SPEC.json`, `spec.json`, `.claude/SPEC.json`, then the first `SPEC*.json`
 * anywhere below the project outside dot-directories and `node_modules`.
 *
 * @returns Absolute path, or null when the project has no SPEC
 */
export function findSpecFile(projectDir: string): string | null {
  const candidates = [
    join(projectDir, 'SPEC.json'),
    join(projectDir, 'spec.json'),
    join(projectDir, '.claude', 'SPEC.json'),
  ];
  for (const candidate of candidates) {
    if (isFile(candidate)) return candidate;
  }
  return searchSpecFile(projectDir);
}

function searchSpecFile(dir: string): string | null {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return null; // unreadable directories are simply not searched
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (entry.isFile() && SPEC_FILE_PATTERN.test(entry.name)) {
      return join(dir, entry.name);
    }
  }
  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name.startsWith('.') || SKIPPED_DIRS.has(entry.name)) continue;
    const found = searchSpecFile(join(dir, entry.name));
    if (found) return found;
  }
  return null;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Project-relative form of a SPEC path, as stored in snapshots */
export function toSpecRef(projectDir: string, specPath: string): string {
  return relative(projectDir, specPath) || specPath;
}

/**
 * Reads and validates a SPEC JSON document.
 * @throws Error when the file is missing, not JSON, or not shaped like a SPEC
 */
export function loadSpecDocument(specPath: string): SpecDocument {
  if (!existsSync(specPath)) {
    throw new Error(`SPEC file not found: ${specPath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(specPath, 'utf-8'));
  } catch (err) {
    throw new Error(`SPEC file is not valid JSON (${specPath}): ${getErrorMessage(err)}`);
  }
  const parsed = SpecDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`SPEC file has an unexpected shape (${specPath}): ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Tasks a phase contributes to the TODO: its plain tasks, then its loop tasks. Tasks
 * without an id are left out. `spec count` and the rendered TODO both use this list.
 */
export function phaseTasks(phase: SpecPhase): SpecTask[] {
  const all = phase.loop ? [...phase.tasks, ...phase.loop.tasks] : phase.tasks;
  return all.filter((task) => task.id !== '');
}

/** The per-item tasks of a loop phase, repeated for every loop item. */
export function loopTasks(phase: SpecPhase): SpecTask[] {
  return (phase.loop?.tasks ?? []).filter((task) => task.id !== '');
}

export function isLoopPhase(phase: SpecPhase): boolean {
  return phase.loop !== undefined;
}

/**
 * Counts the tasks of a parsed SPEC document: every phase's `tasks` plus its loop's tasks.
 * Tasks without an id are not counted.
 */
export function countDocumentTasks(spec: SpecDocument): SpecTaskCount {
  const taskIds: string[] = [];
  const tasks: string[] = [];
  for (const phase of spec.phases) {
    for (const task of phaseTasks(phase)) {
      taskIds.push(task.id);
      tasks.push(`${task.id}: ${task.task.slice(0, TASK_SUMMARY_WIDTH)}`);
    }
  }
  return { count: taskIds.length, taskIds, tasks };
}

/**
 * Counts the tasks of a Markdown SPEC. Header tasks come first, then table rows whose id
 * was not already seen.
 */
export function countMarkdownTasks(content: string): SpecTaskCount {
  const taskIds: string[] = [];
  const tasks: string[] = [];

  for (const match of content.matchAll(MD_HEADER_PATTERN)) {
    if (taskIds.includes(match[1])) continue;
    taskIds.push(match[1]);
    tasks.push(`${match[1]}: ${match[2].trim().slice(0, TASK_SUMMARY_WIDTH)}`);
  }
  for (const match of content.matchAll(MD_TABLE_PATTERN)) {
    if (taskIds.includes(match[1])) continue;
    taskIds.push(match[1]);
    tasks.push(`${match[1]}: ${match[2].trim().slice(0, TASK_SUMMARY_WIDTH)}`);
  }

  return { count: taskIds.length, taskIds, tasks };
}

/**
 * Counts the tasks of a SPEC file by extension.
 * @returns The count, or null for an unsupported extension
 * @throws Error when the file cannot be read or parsed
 */
export function countSpecTasks(specPath: string): SpecTaskCount | null {
  switch (extname(specPath).toLowerCase()) {
    case '.json':
      return countDocumentTasks(loadSpecDocument(specPath));
    case '.md':
      if (!existsSync(specPath)) {
        throw new Error(`SPEC file not found: ${specPath}`);
      }
      return countMarkdownTasks(readFileSync(specPath, 'utf-8'));
    default:
      return null;
  }
}
