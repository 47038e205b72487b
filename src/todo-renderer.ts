/**
 * @fileoverview Renders the TodoWrite list a SPEC run should report.
 *
 * Shapes:
 * - base (also used when there is no checkpoint): every task of every phase, one item each;
 *   this is the list the expectation gate counts
 * - loop in progress: phases before the loop collapsed to `N.x` summaries, the loop phase
 *   shown as a progress item followed by its tasks expanded for the current loop item, later
 *   phases listed task by task
 * - loop completed: as above, with the loop phase itself collapsed to an `N.loop` summary
 *
 * When task ids start with their phase number (`2.3` in phase 2), each shape reconciles
 * against the base list and against the shape before it.
 *
 * @module todo-renderer
 */

import { TASK_CONTENT_WIDTH, TASK_SUMMARY_WIDTH } from './config/guard-config.js';
import { isLoopPhase, loopTasks, phaseTasks } from './spec-extractor.js';
import { compareNaturalIds, phaseOf } from './task-id.js';
import type { Checkpoint, SpecDocument, SpecPhase, SpecTask, TaskItem, TodoStatus } from './types.js';

const STATUS_ICONS: Record<TodoStatus, string> = {
  completed: '☒',
  in_progress: '◐',
  pending: '☐',
};

function taskItem(task: SpecTask): TaskItem {
  const text = task.task.slice(0, TASK_CONTENT_WIDTH);
  return { content: `${task.id}: ${text}`, status: 'pending', activeForm: `Working on ${text}` };
}

// "10.1" -> "10"; a phase without tasks falls back to its own id ("phase-3" -> "3")
function phaseNumber(phase: SpecPhase, tasks: readonly SpecTask[]): string {
  const firstId = tasks[0]?.id;
  if (firstId) return firstId.split('.')[0];
  return phaseOf(phase.id) ?? '?';
}

function summaryItem(marker: string, phase: SpecPhase, progress: string): TaskItem {
  return {
    content: `${marker}: ${phase.name} (${progress}) ✓`,
    status: 'completed',
    activeForm: `Completed ${phase.name}`,
  };
}

/** All tasks visible, nothing collapsed or expanded. */
export function renderBaseTodos(spec: SpecDocument): TaskItem[] {
  return spec.phases.flatMap((phase) => phaseTasks(phase).map(taskItem));
}

/**
 * Renders the list for the current checkpoint. Without a checkpoint, or for a SPEC without
 * a loop phase, this is the base list.
 */
export function renderTodos(spec: SpecDocument, checkpoint: Checkpoint | null): TaskItem[] {
  const loopIndex = spec.phases.findIndex(isLoopPhase);
  if (!checkpoint || loopIndex === -1) {
    return renderBaseTodos(spec);
  }

  const todos: TaskItem[] = [];
  spec.phases.forEach((phase, i) => {
    const tasks = phaseTasks(phase);
    if (i < loopIndex) {
      if (tasks.length > 0) {
        todos.push(summaryItem(`${phaseNumber(phase, tasks)}.x`, phase, `${tasks.length}/${tasks.length}`));
      }
    } else if (i === loopIndex) {
      if (checkpoint.status === 'completed') {
        const progress = `${checkpoint.completedItems.length}/${checkpoint.totalItems}`;
        todos.push(summaryItem(`${phaseNumber(phase, tasks)}.loop`, phase, progress));
      } else {
        todos.push(...renderLoopPhase(phase, checkpoint));
      }
    } else {
      todos.push(...tasks.map(taskItem));
    }
  });
  return todos;
}

function renderLoopPhase(phase: SpecPhase, checkpoint: Checkpoint): TaskItem[] {
  const total = checkpoint.totalItems;
  const itemNumber = checkpoint.currentIndex + 1;
  const itemName = checkpoint.currentItemName ?? 'Unknown';
  const currentTask = checkpoint.currentTask;

  // One-off tasks of the loop phase stay listed as they are
  const items: TaskItem[] = phase.tasks.filter((task) => task.id !== '').map(taskItem);
  items.push({
    content: `${phase.id}: ${phase.name} (${checkpoint.completedItems.length}/${total})`,
    status: 'in_progress',
    activeForm: `Processing item ${itemNumber}/${total}`,
  });

  for (const task of loopTasks(phase)) {
    const description = task.task.slice(0, TASK_SUMMARY_WIDTH);
    let status: TodoStatus = 'pending';
    if (currentTask) {
      if (compareNaturalIds(task.id, currentTask) < 0) {
        status = 'completed';
      } else if (task.id === currentTask) {
        status = 'in_progress';
      }
    }
    items.push({
      content: `  ${task.id}: [${itemNumber}/${total}] ${description}`,
      status,
      activeForm: `${description} for ${itemName}`,
    });
  }
  return items;
}

/** Human preview of a rendered list, one status icon per item. */
export function formatTodoPreview(todos: readonly TaskItem[]): string {
  const rule = '='.repeat(60);
  const lines = [rule, `TODO Preview (${todos.length} items)`, rule, ''];
  for (const todo of todos) {
    lines.push(`${STATUS_ICONS[todo.status]} ${todo.content}`);
  }
  return lines.join('\n');
}
