export const TaskStatus = {
  Pending: 'Pending',
  Completed: 'Completed',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Every status, in lifecycle order */
export const TASK_STATUSES = [TaskStatus.Pending, TaskStatus.Completed] as const;
