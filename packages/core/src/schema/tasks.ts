import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { TaskStatus, TASK_STATUSES } from '../types/task-status.js';

/** Local wall-clock time in the record's `YYYY-MM-DD HH:MM:SS` form */
export const LOCAL_NOW_SQL = `strftime('%Y-%m-%d %H:%M:%S', 'now', 'localtime')`;

export const tasks = sqliteTable('tasks', {
  /** Rowid alias: SQLite assigns max(id) + 1 */
  id: integer('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull(),
  status: text('status', { enum: TASK_STATUSES }).notNull().default(TaskStatus.Pending),
  createdDate: text('created_date').notNull().default(sql.raw(`(${LOCAL_NOW_SQL})`)),
}, (table) => [
  index('idx_tasks_created_date').on(table.createdDate),
]);

export type TaskRow = typeof tasks.$inferSelect;
