import type { TaskStatus } from './task-status.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly createdDate: string; // yyyy-MM-dd HH:mm:ss, local time
}

/** Flat key-value form used by the JSON file layout */
export interface TaskDict {
  id: number;
  title: string;
  description: string;
  status: TaskStatus;
  created_date: string;
}

export interface TaskStats {
  readonly total: number;
  readonly pending: number;
  readonly completed: number;
  readonly createdToday: number;
}
