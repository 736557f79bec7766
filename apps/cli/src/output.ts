/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import { TaskStatus } from '@taskkeeper/core';
import type { Task, TaskStats, StoreKind } from '@taskkeeper/core';

// --- Formatting functions ---

export function formatStatus(status: TaskStatus, width = 0): string {
  const label = status.padEnd(width);
  return status === TaskStatus.Completed ? chalk.green(label) : chalk.yellow(label);
}

export function printTaskTable(tasks: readonly Task[]): void {
  const header = `${'ID'.padEnd(5)}${'TITLE'.padEnd(25)}${'STATUS'.padEnd(10)}${'CREATED DATE'.padEnd(20)}DESCRIPTION`;
  console.log(chalk.bold(header));

  for (const task of tasks) {
    const id = chalk.dim(String(task.id).padEnd(5));
    const title = truncate(task.title, 23).padEnd(25);
    const status = formatStatus(task.status, 10);
    const created = task.createdDate.padEnd(20);
    console.log(`${id}${title}${status}${created}${truncate(task.description, 28)}`);
  }
}

export function printTaskDetails(task: Task): void {
  console.log(`${chalk.bold('ID:')}          ${task.id}`);
  console.log(`${chalk.bold('Title:')}       ${task.title}`);
  console.log(`${chalk.bold('Status:')}      ${formatStatus(task.status)}`);
  console.log(`${chalk.bold('Created:')}     ${task.createdDate}`);
  console.log(`${chalk.bold('Description:')}`);
  console.log(task.description);
}

export function printStatistics(stats: TaskStats, backend: StoreKind): void {
  console.log(chalk.bold.underline(`Task statistics (${backend})`));
  const rows: Array<[string, number]> = [
    ['Total tasks:', stats.total],
    ['Pending:', stats.pending],
    ['Completed:', stats.completed],
    ['Created today:', stats.createdToday],
  ];
  for (const [label, value] of rows) {
    console.log(`${label.padEnd(22)}${value}`);
  }
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

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
