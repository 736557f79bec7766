import type { Task, TaskId, TaskStats } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';

export type StoreKind = 'file' | 'sqlite';

/**
 * Persistence-and-query capability shared by both backends.
 * `null` means no record has the requested id.
 */
export interface TaskStore {
  readonly kind: StoreKind;

  /** Assign the next id, persist a Pending task and return it */
  add(title: string, description: string): Task;
  readAll(): Task[];
  readById(id: TaskId): Task | null;
  /** Replace title, description and status of the stored record; id and creation date are kept */
  update(task: Task): Task | null;
  delete(id: TaskId): Task | null;
  search(keyword: string, status?: TaskStatus): Task[];
  statistics(): TaskStats;
}
