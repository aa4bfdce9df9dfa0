/**
 * chalk-based status output. format* functions build lines, print* write them.
 */

import chalk from 'chalk';
import type { PromotionResult, QueueConfig, RemoteTask } from '@chore-queue/core';

// --- Formatting functions ---

export function formatResult(result: PromotionResult): string[] {
  switch (result.status) {
    case 'ok': {
      const lines = [
        chalk.green(`success: '${result.promotedTaskTitle}' promoted to ${result.dueExpression} in ${result.queueName}`),
      ];
      if (result.demotedCount > 0) {
        lines.push(chalk.dim(`  cleared due dates from ${result.demotedCount} other tasks`));
      }
      if (result.labelApplied && result.label) {
        lines.push(chalk.dim(`  applied ${result.label} label`));
      }
      return lines;
    }
    case 'empty':
      return [`info: ${result.queueName} has no tasks`];
    case 'project_not_found':
      return [chalk.red(`error: project '${result.queueName}' not found`)];
    case 'error':
      return [chalk.red(`error: ${result.queueName} - ${result.errorDetail}`)];
  }
}

export function formatDue(task: RemoteTask): string {
  if (!task.due) return '';
  return chalk.dim(`  due: ${task.due.string || task.due.date}`);
}

/** Queue listing: head first, marked with an arrow */
export function formatQueueOrder(tasks: readonly RemoteTask[]): string[] {
  const width = String(tasks.length).length;
  return tasks.map((task, i) => {
    const marker = i === 0 ? chalk.green('→') : ' ';
    const index = chalk.dim(String(i + 1).padStart(width, ' '));
    const title = i === 0 ? chalk.bold(truncate(task.content, 72)) : truncate(task.content, 72);
    return `${marker} ${index}  ${title}${formatDue(task)}`;
  });
}

export function formatQueueConfig(queue: QueueConfig): string {
  const parts = [
    `due ${queue.dueExpression} (${queue.locale})`,
    queue.promoteLabel ? `label ${queue.promoteLabel}` : 'no label',
    queue.clearDueOnRest ? 'clears rest' : 'keeps rest',
  ];
  return `  ${chalk.bold(queue.queueName)}: ${chalk.dim(parts.join(', '))}`;
}

// --- Result output ---

export function printResult(result: PromotionResult): void {
  for (const line of formatResult(result)) console.log(line);
}

// --- Basic output ---

export function warning(message: string): void {
  console.error(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

/** Whole-process failures go to stderr */
export function fatal(message: string): void {
  console.error(chalk.red(message));
}

export function debug(message: string): void {
  console.error(chalk.dim(message));
}

// --- Utilities ---

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  return s.slice(0, maxLen - 1) + '…';
}
