/**
 * @fileoverview spec-guard CLI command definitions
 *
 * Defines the hook entry points Claude Code invokes, the checkpoint commands the SPEC
 * executor issues around its per-item loop, and operator utilities for the canonical TODO,
 * SPEC counting and TODO rendering.
 *
 * @module cli
 */

import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { CanonicalStore } from './canonical-store.js';
import { CheckpointStore } from './checkpoint-store.js';
import { DEFAULT_HOOK_COMMAND, DEFAULT_LOOP_PHASE, resolveGuardConfig, type GuardConfig } from './config/guard-config.js';
import { FileExpectationSlot } from './expected-count-gate.js';
import { writeHooksConfig } from './hooks-config.js';
import { reconcile } from './reconciliation.js';
import {
  formatCanonicalSummary,
  formatCheckpointSummary,
  formatReconcileResult,
  formatSpecCount,
} from './report-format.js';
import { TaskItemSchema } from './schemas.js';
import { countSpecTasks, loadSpecDocument } from './spec-extractor.js';
import { evaluateStopEvent } from './stop-guard.js';
import { TodoValidator, toHookOutput } from './todo-validator.js';
import { formatTodoPreview, renderBaseTodos, renderTodos } from './todo-renderer.js';
import { getErrorMessage, type TaskItem } from './types.js';

interface ProjectOptions {
  project?: string;
}

const TodoListFileSchema = z.union([z.array(TaskItemSchema), z.object({ todos: z.array(TaskItemSchema) })]);

function parseCount(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parseInt(value, 10);
}

function configFor(options: ProjectOptions): GuardConfig {
  return resolveGuardConfig({ projectDir: options.project });
}

/** Runs a command body, turning any thrown error into a red message and exit code 1. */
function run(action: () => void): void {
  try {
    action();
  } catch (err) {
    console.error(chalk.red(`✗ ${getErrorMessage(err)}`));
    process.exit(1);
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const program = new Command();

program
  .name('spec-guard')
  .description('TodoWrite integrity guard and checkpoint ledger for long SPEC executions')
  .version('1.0.0');

// ============ Hook Commands ============

const hookCmd = program
  .command('hook')
  .description('Entry points for Claude Code hooks (read the event JSON from stdin)');

hookCmd
  .command('validate')
  .description('PostToolUse: validate a TodoWrite against the canonical TODO')
  .option('-C, --project <dir>', 'Project directory when the event has no cwd')
  .action(async (options: ProjectOptions) => {
    const input = await readStdin();
    const config = configFor(options);
    const validator = new TodoValidator({
      expectations: new FileExpectationSlot(config.expectationFile),
      defaultProjectDir: config.projectDir,
    });
    const output = toHookOutput(validator.validateRaw(input));
    if (output.stdout) process.stdout.write(output.stdout + '\n');
    if (output.stderr) process.stderr.write(output.stderr + '\n');
  });

hookCmd
  .command('stop')
  .description('Stop: block stopping while a SPEC run has pending tasks')
  .option('-C, --project <dir>', 'Project directory when the event has no cwd')
  .action(async (options: ProjectOptions) => {
    const input = await readStdin();
    const decision = evaluateStopEvent(input, configFor(options).projectDir);
    process.stdout.write(JSON.stringify(decision) + '\n');
  });

// ============ Expectation ============

program
  .command('expect <count>')
  .description('Require the next TodoWrite to contain exactly <count> items')
  .action((count: string) => {
    run(() => {
      const expected = parseCount(count);
      const slot = new FileExpectationSlot(resolveGuardConfig().expectationFile);
      slot.write(expected);
      console.log(chalk.green(`✓ Next TodoWrite must contain exactly ${expected} items`));
      console.log(`  Expectation: ${slot.location}`);
    });
  });

// ============ Checkpoint Commands ============

const checkpointCmd = program
  .command('checkpoint')
  .alias('cp')
  .description('Track progress through a per-item loop');

checkpointCmd
  .command('init <spec>')
  .description('Initialize a checkpoint (overwrites an existing one)')
  .requiredOption('--total <n>', 'Total items to process', parseCount)
  .option('--loop-phase <id>', 'Phase ID containing the loop', DEFAULT_LOOP_PHASE)
  .option('--spec-file <path>', 'SPEC file the loop belongs to')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions & { total: number; loopPhase: string; specFile?: string }) => {
    run(() => {
      const store = new CheckpointStore(configFor(options).projectDir);
      const checkpoint = store.init(spec, options.total, options.loopPhase, options.specFile ?? null);
      console.log(chalk.green(`✓ Checkpoint initialized: ${store.checkpointPath(spec)}`));
      console.log(`  Total items to process: ${checkpoint.totalItems}`);
    });
  });

checkpointCmd
  .command('read <spec>')
  .description('Show checkpoint status')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions) => {
    run(() => {
      const checkpoint = new CheckpointStore(configFor(options).projectDir).read(spec);
      if (!checkpoint) {
        console.log(chalk.yellow(`No checkpoint found for: ${spec}`));
        return;
      }
      console.log('\n' + formatCheckpointSummary(checkpoint));
      console.log(`\nJSON:\n${JSON.stringify(checkpoint, null, 2)}`);
    });
  });

checkpointCmd
  .command('update <spec>')
  .description('Move the cursor to an item and task')
  .requiredOption('--index <n>', 'Current item index (0-based)', parseCount)
  .requiredOption('--task <id>', 'Current task ID (e.g. 2.5)')
  .option('--item-id <id>', 'Current item ID')
  .option('--item-name <name>', 'Current item name (for display)')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions & { index: number; task: string; itemId?: string; itemName?: string }) => {
    run(() => {
      const store = new CheckpointStore(configFor(options).projectDir);
      const checkpoint = store.update(spec, options.index, options.task, options.itemId, options.itemName);
      const item = checkpoint.currentItemName ?? checkpoint.currentItemId ?? 'N/A';
      console.log(chalk.green(`✓ Checkpoint updated: index=${options.index}, task=${options.task}, item=${item}`));
    });
  });

checkpointCmd
  .command('complete <spec>')
  .description('Mark an item as completed')
  .requiredOption('--index <n>', 'Completed item index', parseCount)
  .option('--item-id <id>', 'Completed item ID')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions & { index: number; itemId?: string }) => {
    run(() => {
      const store = new CheckpointStore(configFor(options).projectDir);
      const checkpoint = store.complete(spec, options.index, options.itemId);
      if (checkpoint.status === 'completed') {
        console.log(chalk.green(`✓ All ${checkpoint.totalItems} items completed!`));
      } else {
        const remaining = checkpoint.totalItems - checkpoint.completedItems.length;
        console.log(chalk.green(`✓ Item ${options.index} completed. ${remaining} remaining.`));
      }
    });
  });

checkpointCmd
  .command('fail <spec>')
  .description('Mark an item as failed (informational, the loop continues)')
  .requiredOption('--index <n>', 'Failed item index', parseCount)
  .option('--item-id <id>', 'Failed item ID')
  .option('--reason <text>', 'Failure reason', '')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions & { index: number; itemId?: string; reason: string }) => {
    run(() => {
      new CheckpointStore(configFor(options).projectDir).fail(spec, options.index, options.itemId, options.reason);
      console.log(chalk.yellow(`Item ${options.index} marked as failed: ${options.reason}`));
    });
  });

checkpointCmd
  .command('decide <spec> <text>')
  .description('Append a line to the checkpoint decision log')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, text: string, options: ProjectOptions) => {
    run(() => {
      const path = new CheckpointStore(configFor(options).projectDir).recordDecision(spec, text);
      console.log(chalk.green(`✓ Decision recorded: ${path}`));
    });
  });

checkpointCmd
  .command('clear <spec>')
  .description('Delete the checkpoint, its decision log and the canonical TODO')
  .option('--keep-canonical', 'Keep the canonical TODO file')
  .option('-C, --project <dir>', 'Project directory')
  .action((spec: string, options: ProjectOptions & { keepCanonical?: boolean }) => {
    run(() => {
      const store = new CheckpointStore(configFor(options).projectDir);
      const result = store.clear(spec, !options.keepCanonical);
      console.log(
        result.checkpointRemoved
          ? chalk.green(`✓ Checkpoint cleared: ${spec}`)
          : chalk.yellow(`No checkpoint to clear for: ${spec}`),
      );
      if (result.decisionsRemoved) console.log(chalk.green('✓ Decisions file cleared'));
      if (result.canonicalRemoved) console.log(chalk.green('✓ Canonical TODO cleared'));
    });
  });

// ============ Canonical Commands ============

const canonicalCmd = program
  .command('canonical')
  .description('Inspect or reset the canonical TODO');

canonicalCmd
  .command('show')
  .description('Print the canonical TODO')
  .option('-C, --project <dir>', 'Project directory')
  .action((options: ProjectOptions) => {
    run(() => {
      const store = new CanonicalStore(configFor(options).projectDir);
      const loaded = store.load();
      if (loaded.kind === 'missing') {
        console.log(chalk.yellow('No canonical TODO'));
        return;
      }
      if (loaded.kind === 'corrupt') {
        throw new Error(loaded.error.detail);
      }
      console.log(formatCanonicalSummary(loaded.snapshot, store.filePath));
      console.log(`\nJSON:\n${JSON.stringify(loaded.snapshot.todos, null, 2)}`);
    });
  });

canonicalCmd
  .command('clear')
  .description('Delete the canonical TODO so the next write becomes the baseline')
  .option('-C, --project <dir>', 'Project directory')
  .action((options: ProjectOptions) => {
    run(() => {
      const removed = new CanonicalStore(configFor(options).projectDir).clear();
      console.log(removed ? chalk.green('✓ Canonical TODO cleared') : chalk.yellow('No canonical TODO to clear'));
    });
  });

canonicalCmd
  .command('check <todos>')
  .description('Dry-run: reconcile a TODO list (JSON file) against the canonical without saving')
  .option('-C, --project <dir>', 'Project directory')
  .action((todosPath: string, options: ProjectOptions) => {
    run(() => {
      const config = configFor(options);
      const raw: unknown = JSON.parse(readFileSync(resolve(config.projectDir, todosPath), 'utf-8'));
      const parsed = TodoListFileSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`${todosPath} is not a TODO list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }
      const todos = Array.isArray(parsed.data) ? parsed.data : parsed.data.todos;
      const loaded = new CanonicalStore(config.projectDir).load();
      if (loaded.kind === 'missing') {
        console.log(chalk.yellow('No canonical TODO: this write would become the baseline'));
        return;
      }
      if (loaded.kind === 'corrupt') {
        throw new Error(loaded.error.detail);
      }
      const result = reconcile(todos, loaded.snapshot);
      const verdict = formatReconcileResult(result);
      if (result.outcome === 'block') {
        console.log(chalk.red(verdict));
        process.exitCode = 1;
      } else {
        console.log(chalk.green(verdict));
      }
    });
  });

// ============ SPEC and TODO Commands ============

const specCmd = program
  .command('spec')
  .description('Work with SPEC files');

specCmd
  .command('count <file>')
  .description('Count the tasks of a SPEC.json or SPEC.md')
  .option('-v, --verbose', 'List every task')
  .option('-C, --project <dir>', 'Project directory the file path is relative to')
  .action((file: string, options: ProjectOptions & { verbose?: boolean }) => {
    run(() => {
      const result = countSpecTasks(resolve(configFor(options).projectDir, file));
      if (!result) {
        throw new Error(`Unsupported file type: ${file} (supported: .json, .md)`);
      }
      console.log('\n' + formatSpecCount(basename(file), result, options.verbose ?? false));
    });
  });

const todoCmd = program
  .command('todo')
  .description('Render TodoWrite lists from a SPEC');

todoCmd
  .command('generate')
  .description('Generate the TODO structure for a SPEC and optional checkpoint')
  .requiredOption('--spec <file>', 'Path to SPEC.json')
  .option('--checkpoint <name>', 'Checkpoint name')
  .option('--base', 'All tasks, no collapse or expansion')
  .option('--format <format>', 'json, count or preview', 'json')
  .option('-C, --project <dir>', 'Project directory')
  .action((options: ProjectOptions & { spec: string; checkpoint?: string; base?: boolean; format: string }) => {
    run(() => {
      const config = configFor(options);
      const spec = loadSpecDocument(resolve(config.projectDir, options.spec));
      let todos: TaskItem[];
      if (options.base) {
        todos = renderBaseTodos(spec);
      } else {
        const checkpoint = options.checkpoint
          ? new CheckpointStore(config.projectDir).read(options.checkpoint)
          : null;
        todos = renderTodos(spec, checkpoint);
      }

      switch (options.format) {
        case 'count':
          console.log(String(todos.length));
          break;
        case 'preview':
          console.log('\n' + formatTodoPreview(todos) + '\n');
          break;
        case 'json':
          console.log(JSON.stringify(todos, null, 2));
          break;
        default:
          throw new Error(`Unknown format: ${options.format} (use json, count or preview)`);
      }
    });
  });

// ============ Setup ============

const hooksCmd = program
  .command('hooks')
  .description('Manage Claude Code hook registration');

hooksCmd
  .command('install')
  .description('Write the PostToolUse and Stop hooks into .claude/settings.local.json')
  .option('--command <cmd>', 'How hooks invoke this CLI', DEFAULT_HOOK_COMMAND)
  .option('-C, --project <dir>', 'Project directory')
  .action((options: ProjectOptions & { command: string }) => {
    run(() => {
      const path = writeHooksConfig(configFor(options).projectDir, options.command);
      console.log(chalk.green(`✓ Hooks written: ${path}`));
    });
  });

export { program };
