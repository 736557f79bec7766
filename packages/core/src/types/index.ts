export { TaskStatus, TASK_STATUSES } from './task-status.js';
export type { TaskId, Task, TaskDict, TaskStats } from './task.js';
