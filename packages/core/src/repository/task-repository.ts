import type { Task, TaskId, TaskStats } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import type { StoreKind, TaskStore } from '../stores/task-store.js';
import { PersistenceError, errorMessage } from '../errors.js';

/**
 * Uniform façade over exactly one store. Presents the same operations
 * whichever backend is configured, and makes sure nothing but a
 * PersistenceError escapes from the store.
 */
export class TaskRepository {
  constructor(private readonly store: TaskStore) {}

  get backend(): StoreKind {
    return this.store.kind;
  }

  add(title: string, description: string): Task {
    return this.guard('add task', () => this.store.add(title, description));
  }

  listAll(): Task[] {
    return this.guard('retrieve tasks', () => this.store.readAll());
  }

  find(id: TaskId): Task | null {
    return this.guard('find task', () => this.store.readById(id));
  }

  update(task: Task): Task | null {
    return this.guard('update task', () => this.store.update(task));
  }

  delete(id: TaskId): Task | null {
    return this.guard('delete task', () => this.store.delete(id));
  }

  search(keyword: string, status?: TaskStatus): Task[] {
    return this.guard('search tasks', () => this.store.search(keyword, status));
  }

  statistics(): TaskStats {
    return this.guard('get statistics', () => this.store.statistics());
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
