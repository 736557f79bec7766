import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import pino, { type Logger } from 'pino';
import type { Task, TaskId, TaskStats } from '../src/types/task.js';
import { TaskStatus } from '../src/types/task-status.js';
import type { StoreKind, TaskStore } from '../src/stores/task-store.js';
import { createTaskRecord, matchesKeyword } from '../src/records/task-record.js';

export function makeTempDir(prefix = 'taskkeeper-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface LogLine {
  level: number;
  msg: string;
  module?: string;
  [key: string]: unknown;
}

/** A pino logger whose JSON lines are kept in memory */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino({ level: 'debug' }, {
    write(msg: string) {
      lines.push(JSON.parse(msg) as LogLine);
    },
  });
  return { logger, lines };
}

/** Minimal store kept entirely in memory, for layers above the store */
export class InMemoryTaskStore implements TaskStore {
  readonly kind: StoreKind = 'file';
  tasks: Task[] = [];

  constructor(private readonly now: Date = new Date(2024, 2, 10, 12, 0, 0)) {}

  add(title: string, description: string): Task {
    const id = this.tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
    const task = createTaskRecord(id, title, description, this.now);
    this.tasks.push(task);
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
    if (index < 0) return null;
    this.tasks[index] = task;
    return task;
  }

  delete(id: TaskId): Task | null {
    const removed = this.readById(id);
    this.tasks = this.tasks.filter(t => t.id !== id);
    return removed;
  }

  search(keyword: string, status?: TaskStatus): Task[] {
    return this.tasks.filter(t => matchesKeyword(t, keyword) && (status == null || t.status === status));
  }

  statistics(): TaskStats {
    return {
      total: this.tasks.length,
      pending: this.tasks.filter(t => t.status === TaskStatus.Pending).length,
      completed: this.tasks.filter(t => t.status === TaskStatus.Completed).length,
      createdToday: this.tasks.length,
    };
  }
}
