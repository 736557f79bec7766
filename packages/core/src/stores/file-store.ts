import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { Task, TaskId, TaskStats } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { TaskStore } from './task-store.js';
import {
  createTaskRecord, isCreatedOn, matchesKeyword,
  parseTaskDocument, serializeTaskDocument,
} from '../records/task-record.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { silentLogger } from '../logger.js';

export interface FileTaskStoreOptions {
  /** JSON document holding every task */
  filePath: string;
  logger?: Logger;
  /** Source of creation timestamps and of "today" for statistics */
  clock?: () => Date;
}

/**
 * Keeps every task in memory and rewrites the whole JSON document after
 * each mutation. No locking: one process per file.
 */
export class FileTaskStore implements TaskStore {
  readonly kind = 'file';

  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private tasks: Task[] = [];

  constructor(options: FileTaskStoreOptions) {
    this.filePath = options.filePath;
    this.logger = (options.logger ?? silentLogger()).child({ module: 'file-store' });
    this.clock = options.clock ?? (() => new Date());
    this.load();
  }

  /**
   * Read the document into memory. A missing file is an empty store; an
   * unreadable or malformed one is logged and also treated as empty.
   */
  load(): void {
    if (!existsSync(this.filePath)) {
      this.tasks = [];
      this.logger.info({ filePath: this.filePath }, 'No existing task file found');
      return;
    }

    try {
      this.tasks = parseTaskDocument(readFileSync(this.filePath, 'utf8'));
      this.logger.info({ filePath: this.filePath, count: this.tasks.length }, 'Loaded tasks');
    } catch (err: unknown) {
      this.tasks = [];
      this.logger.warn({ err, filePath: this.filePath }, 'Could not load task file, starting with no tasks');
    }
  }

  add(title: string, description: string): Task {
    const task = createTaskRecord(this.nextId(), title, description, this.clock());
    this.tasks.push(task);
    this.save();
    this.logger.info({ taskId: task.id }, `Added task: ${task.title}`);
    return task;
  }

  readAll(): Task[] {
    return [...this.tasks];
  }

  readById(id: TaskId): Task | null {
    return this.tasks.find(t => t.id === id) ?? null;
  }

  update(task: Task): Task | null {
    const index = this.tasks.findIndex(t => t.id === task.id);
    const existing = this.tasks[index];
    if (!existing) return null;

    const updated: Task = {
      ...existing,
      title: task.title,
      description: task.description,
      status: task.status,
    };
    this.tasks[index] = updated;
    this.save();
    this.logger.info({ taskId: updated.id }, `Updated task: ${updated.title}`);
    return updated;
  }

  delete(id: TaskId): Task | null {
    const index = this.tasks.findIndex(t => t.id === id);
    const removed = this.tasks[index];
    if (!removed) return null;

    this.tasks.splice(index, 1);
    this.save();
    this.logger.info({ taskId: id }, `Deleted task: ${removed.title}`);
    return removed;
  }

  search(keyword: string, status?: TaskStatus): Task[] {
    return this.tasks.filter(t => matchesKeyword(t, keyword) && (status == null || t.status === status));
  }

  statistics(): TaskStats {
    const today = this.clock();
    let pending = 0;
    let completed = 0;
    let createdToday = 0;

    for (const task of this.tasks) {
      if (task.status === TaskStatus.Pending) pending++;
      else if (task.status === TaskStatus.Completed) completed++;
      if (isCreatedOn(task, today)) createdToday++;
    }

    return { total: this.tasks.length, pending, completed, createdToday };
  }

  /** Highest id in the store plus one; 1 when empty */
  private nextId(): TaskId {
    return this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, serializeTaskDocument(this.tasks), 'utf8');
      this.logger.debug({ filePath: this.filePath, count: this.tasks.length }, 'Saved tasks');
    } catch (err: unknown) {
      this.logger.error({ err, filePath: this.filePath }, 'Error saving task data');
      throw new PersistenceError(`Failed to save tasks: ${errorMessage(err)}`, { cause: err });
    }
  }
}
