/**
 * Task record helpers: construction, copies, the flat `TaskDict` form and the
 * JSON document the file store persists.
 */

import { z } from 'zod';
import type { Task, TaskDict, TaskId } from '../types/task.js';
import { TaskStatus, TASK_STATUSES } from '../types/task-status.js';
import { ValidationError } from '../errors.js';

export const MAX_TITLE_LENGTH = 50;

const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export const taskDictSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string(),
  status: z.enum(TASK_STATUSES),
  created_date: z.string().regex(TIMESTAMP_PATTERN, 'expected YYYY-MM-DD HH:MM:SS'),
});

const taskDocumentSchema = z.array(taskDictSchema).superRefine((dicts, ctx) => {
  const seen = new Set<number>();
  dicts.forEach((dict, index) => {
    if (seen.has(dict.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `duplicate task id ${dict.id}`,
      });
    }
    seen.add(dict.id);
  });
});

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Format a date as local `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/** Create a new Pending task stamped with `now` */
export function createTaskRecord(id: TaskId, title: string, description: string, now: Date = new Date()): Task {
  return {
    id,
    title,
    description,
    status: TaskStatus.Pending,
    createdDate: formatTimestamp(now),
  };
}

/** Return a copy of the task with a new status */
export function withStatus(task: Task, status: TaskStatus): Task {
  return { ...task, status };
}

/** Return a copy of the task with new title and description */
export function withContent(task: Task, title: string, description: string): Task {
  return { ...task, title, description };
}

/** True when the task was created on the calendar day of `day` */
export function isCreatedOn(task: Task, day: Date): boolean {
  return task.createdDate.slice(0, 10) === formatTimestamp(day).slice(0, 10);
}

/** Case-insensitive substring match against title or description */
export function matchesKeyword(task: Task, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  return task.title.toLowerCase().includes(needle) || task.description.toLowerCase().includes(needle);
}

export function toDict(task: Task): TaskDict {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    created_date: task.createdDate,
  };
}

export function fromDict(dict: unknown): Task {
  const parsed = taskDictSchema.safeParse(dict);
  if (!parsed.success) {
    throw new ValidationError(`Invalid task record: ${parsed.error.issues.map(formatIssue).join('; ')}`);
  }
  return dictToTask(parsed.data);
}

function dictToTask(dict: TaskDict): Task {
  return {
    id: dict.id,
    title: dict.title,
    description: dict.description,
    status: dict.status,
    createdDate: dict.created_date,
  };
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Parse the persisted JSON document. Throws on malformed JSON, on a record
 * that does not match the layout, and on duplicate ids.
 */
export function parseTaskDocument(text: string): Task[] {
  const json: unknown = JSON.parse(text);
  return taskDocumentSchema.parse(json).map(dictToTask);
}

export function serializeTaskDocument(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toDict), null, 2);
}
