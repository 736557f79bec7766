/**
 * Relational task store on SQLite.
 *
 * Every operation opens its own connection through `withConnection`, runs in
 * one transaction and closes the connection before returning. Failures are
 * logged and rethrown as PersistenceError with the driver error as `cause`.
 */

import { eq, and, or, desc, count, sql, type SQL } from 'drizzle-orm';
import type { Logger } from 'pino';
import type { Task, TaskId, TaskStats } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import type { TaskStore } from './task-store.js';
import { tasks, type TaskRow } from '../schema/tasks.js';
import { withConnection, initSchema, type ConnectionOptions, type TaskDb, type RawDb } from '../db.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { silentLogger } from '../logger.js';

export interface SqlTaskStoreOptions extends ConnectionOptions {
  logger?: Logger;
}

/** Map a Drizzle row to a Task object */
function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    createdDate: row.createdDate,
  };
}

/**
 * Build an FTS5 query from free text: every word becomes a quoted term and
 * terms are ANDed. Returns null when the text holds no indexable word.
 */
export function toMatchQuery(keyword: string): string | null {
  const terms = keyword.match(/[\p{L}\p{N}]+/gu);
  if (!terms) return null;
  return terms.map(term => `"${term}"`).join(' ');
}

export class SqlTaskStore implements TaskStore {
  readonly kind = 'sqlite';

  private readonly connection: ConnectionOptions;
  private readonly logger: Logger;

  constructor(options: SqlTaskStoreOptions) {
    this.connection = { path: options.path, busyTimeoutMs: options.busyTimeoutMs };
    this.logger = (options.logger ?? silentLogger()).child({ module: 'sql-store' });
    this.initialize();
  }

  /** Create the table and text-search index if missing */
  initialize(): void {
    this.run('initialize database', (_db, raw) => initSchema(raw));
    this.logger.info({ path: this.connection.path }, 'Database initialized');
  }

  add(title: string, description: string): Task {
    const task = this.run('add task', db => {
      const row = db.insert(tasks).values({ title, description }).returning().get();
      if (!row) throw new Error('insert returned no row');
      return toTask(row);
    });
    this.logger.info({ taskId: task.id }, `Added task: ${task.title}`);
    return task;
  }

  readAll(): Task[] {
    return this.run('retrieve tasks', db =>
      db.select().from(tasks).orderBy(desc(tasks.createdDate), desc(tasks.id)).all().map(toTask),
    );
  }

  readById(id: TaskId): Task | null {
    return this.run('find task', db => {
      const row = db.select().from(tasks).where(eq(tasks.id, id)).get();
      return row ? toTask(row) : null;
    });
  }

  update(task: Task): Task | null {
    const updated = this.run('update task', db => {
      const row = db.update(tasks)
        .set({ title: task.title, description: task.description, status: task.status })
        .where(eq(tasks.id, task.id))
        .returning()
        .get();
      return row ? toTask(row) : null;
    });
    if (updated) this.logger.info({ taskId: updated.id }, `Updated task: ${updated.title}`);
    return updated;
  }

  delete(id: TaskId): Task | null {
    // Fetch first so the removed record can be returned; both statements share one transaction
    const removed = this.run('delete task', db => {
      const row = db.select().from(tasks).where(eq(tasks.id, id)).get();
      if (!row) return null;
      db.delete(tasks).where(eq(tasks.id, id)).run();
      return toTask(row);
    });
    if (removed) this.logger.info({ taskId: id }, `Deleted task: ${removed.title}`);
    return removed;
  }

  search(keyword: string, status?: TaskStatus): Task[] {
    const needle = keyword.toLowerCase();
    const clauses: SQL[] = [];

    const match = toMatchQuery(keyword);
    if (match) {
      clauses.push(sql`${tasks.id} IN (SELECT rowid FROM tasks_fts WHERE tasks_fts MATCH ${match})`);
    }
    clauses.push(
      sql`instr(casefold(${tasks.title}), ${needle}) > 0`,
      sql`instr(casefold(${tasks.description}), ${needle}) > 0`,
    );

    const keywordCondition = or(...clauses);
    const condition = status != null ? and(keywordCondition, eq(tasks.status, status)) : keywordCondition;

    return this.run('search tasks', db =>
      db.select().from(tasks).where(condition).orderBy(desc(tasks.createdDate), desc(tasks.id)).all().map(toTask),
    );
  }

  statistics(): TaskStats {
    return this.run('get statistics', db => {
      const row = db.select({
        total: count(),
        pending: sql<number>`coalesce(sum(case when ${tasks.status} = ${TaskStatus.Pending} then 1 else 0 end), 0)`.mapWith(Number),
        completed: sql<number>`coalesce(sum(case when ${tasks.status} = ${TaskStatus.Completed} then 1 else 0 end), 0)`.mapWith(Number),
        createdToday: sql<number>`coalesce(sum(case when date(${tasks.createdDate}) = date('now', 'localtime') then 1 else 0 end), 0)`.mapWith(Number),
      }).from(tasks).get();

      return {
        total: row?.total ?? 0,
        pending: row?.pending ?? 0,
        completed: row?.completed ?? 0,
        createdToday: row?.createdToday ?? 0,
      };
    });
  }

  private run<T>(operation: string, fn: (db: TaskDb, raw: RawDb) => T): T {
    try {
      return withConnection(this.connection, fn);
    } catch (err: unknown) {
      this.logger.error({ err, operation }, `Failed to ${operation}`);
      throw new PersistenceError(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
