/**
 * Validation and coercion in front of the repository. Nothing reaches the
 * store until the input has passed the checks below.
 */

import type { Logger } from 'pino';
import type { Task, TaskId, TaskStats } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { TaskRepository } from '../repository/task-repository.js';
import { MAX_TITLE_LENGTH, withContent, withStatus } from '../records/task-record.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { silentLogger } from '../logger.js';

const ID_PATTERN = /^\+?\d+$/;

/**
 * Coerce an identifier received from the boundary (number or text) into a
 * positive integer id.
 */
export function parseTaskId(raw: unknown): TaskId {
  let value: number | null = null;

  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && ID_PATTERN.test(raw.trim())) {
    value = Number(raw.trim());
  }

  if (value == null || !Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError('Task ID must be a positive integer');
  }
  return value;
}

/** Check title and description; length is counted on the input as received */
export function validateTaskFields(title: string, description: string): { title: string; description: string } {
  if (!title || !title.trim()) {
    throw new ValidationError('Task title cannot be empty');
  }
  if ([...title].length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`Task title cannot exceed ${MAX_TITLE_LENGTH} characters`);
  }
  if (!description || !description.trim()) {
    throw new ValidationError('Task description cannot be empty');
  }
  return { title: title.trim(), description: description.trim() };
}

export class TaskService {
  private readonly logger: Logger;

  constructor(private readonly repository: TaskRepository, logger?: Logger) {
    this.logger = (logger ?? silentLogger()).child({ module: 'task-service' });
  }

  get backend(): TaskRepository['backend'] {
    return this.repository.backend;
  }

  add(title: string, description: string): Task {
    const fields = validateTaskFields(title, description);
    return this.repository.add(fields.title, fields.description);
  }

  listAll(): Task[] {
    return this.repository.listAll();
  }

  find(rawId: unknown): Task {
    const id = parseTaskId(rawId);
    const task = this.repository.find(id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  /** Idempotent: an already completed task is stored as Completed again */
  markComplete(rawId: unknown): Task {
    const task = this.find(rawId);
    const updated = this.repository.update(withStatus(task, TaskStatus.Completed));
    if (!updated) throw new NotFoundError(task.id);
    return updated;
  }

  /** Replace title and description; status and creation date are kept */
  edit(rawId: unknown, title: string, description: string): Task {
    const id = parseTaskId(rawId);
    const fields = validateTaskFields(title, description);
    const task = this.repository.find(id);
    if (!task) throw new NotFoundError(id);

    const updated = this.repository.update(withContent(task, fields.title, fields.description));
    if (!updated) throw new NotFoundError(id);
    return updated;
  }

  delete(rawId: unknown): Task {
    const id = parseTaskId(rawId);
    const removed = this.repository.delete(id);
    if (!removed) throw new NotFoundError(id);
    return removed;
  }

  /** A blank keyword is "no query": empty result, repository untouched */
  search(keyword: string, status?: TaskStatus): Task[] {
    const trimmed = keyword.trim();
    if (!trimmed) {
      this.logger.debug('Blank search keyword, skipping query');
      return [];
    }
    return this.repository.search(trimmed, status);
  }

  statistics(): TaskStats {
    return this.repository.statistics();
  }
}
