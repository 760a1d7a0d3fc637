/**
 * chalk-based console output for listings and messages.
 */

import chalk from 'chalk';
import type { TaskRecord, AreaRecord, TagRecord, ChecklistItemRecord, TaskStatus } from '@thingsql/core';

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case 'completed': return chalk.green('[x]');
    case 'canceled': return chalk.dim('[-]');
    default: return chalk.gray('[ ]');
  }
}

export function formatTaskType(task: TaskRecord): string {
  switch (task.type) {
    case 'project': return chalk.blue.bold('◆');
    case 'heading': return chalk.magenta('#');
    default: return formatCheckbox(task.status);
  }
}

/** Where a task sits: area, project and heading titles, outermost first */
export function formatContext(task: TaskRecord): string {
  const parts = [task.area_title, task.project_title, task.heading_title]
    .filter((p): p is string => p !== undefined);
  if (parts.length === 0) return '';
  return chalk.dim(`  ${parts.join(' › ')}`);
}

export function formatDates(task: TaskRecord): string {
  const parts: string[] = [];
  if (task.start_date) parts.push(chalk.dim(`start ${task.start_date}`));
  if (task.deadline) parts.push(chalk.red(`due ${task.deadline}`));
  if (task.stop_date) parts.push(chalk.dim(`done ${task.stop_date}`));
  return parts.length > 0 ? `  ${parts.join(' ')}` : '';
}

export function formatTask(task: TaskRecord): string {
  const uuid = chalk.dim(`(${task.uuid})`);
  const text = task.title ?? '';
  const title = task.trashed ? chalk.strikethrough(text) : chalk.bold(text);
  return `${uuid} ${formatTaskType(task)} ${title}${formatDates(task)}${formatContext(task)}`;
}

export function formatArea(area: AreaRecord): string {
  return `${chalk.dim(`(${area.uuid})`)} ${chalk.bold(area.title)}`;
}

export function formatTag(tag: TagRecord): string {
  const shortcut = tag.shortcut ? chalk.dim(`  [${tag.shortcut}]`) : '';
  return `${chalk.dim(`(${tag.uuid})`)} ${chalk.cyan(`#${tag.title}`)}${shortcut}`;
}

export function formatChecklistItem(item: ChecklistItemRecord): string {
  return `${formatCheckbox(item.status)} ${truncate(item.title, 80)}`;
}

// --- Record output ---

export function printTasks(tasks: TaskRecord[]): void {
  if (tasks.length === 0) {
    info('No tasks found');
    return;
  }
  for (const task of tasks) {
    console.log(formatTask(task));
  }
}

export function printTaskDetails(task: TaskRecord, tags: string[], checklist: ChecklistItemRecord[]): void {
  console.log(formatTask(task));
  if (task.notes) {
    for (const line of task.notes.split('\n').filter(l => l.trim().length > 0)) {
      console.log(`    ${chalk.dim(line)}`);
    }
  }
  if (tags.length > 0) {
    console.log(`    ${tags.map(t => chalk.cyan(`#${t}`)).join(' ')}`);
  }
  for (const item of checklist) {
    console.log(`    ${formatChecklistItem(item)}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Basic output ---

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
