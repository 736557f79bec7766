// Types
export { TaskStatus, TASK_STATUSES } from './types/index.js';
export type { TaskId, Task, TaskDict, TaskStats } from './types/index.js';

// Errors
export {
  TaskKeeperError, ValidationError, NotFoundError, PersistenceError, ConfigError,
  isTaskKeeperError, errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Records
export {
  MAX_TITLE_LENGTH, taskDictSchema,
  formatTimestamp, createTaskRecord, withStatus, withContent, isCreatedOn, matchesKeyword,
  toDict, fromDict, parseTaskDocument, serializeTaskDocument,
} from './records/task-record.js';

// Schema
export * from './schema/index.js';

// Database
export { CREATE_SCHEMA_SQL, DEFAULT_BUSY_TIMEOUT_MS, initSchema, openConnection, withConnection } from './db.js';
export type { TaskDb, RawDb, ConnectionOptions } from './db.js';

// Stores
export type { TaskStore, StoreKind } from './stores/task-store.js';
export { FileTaskStore } from './stores/file-store.js';
export type { FileTaskStoreOptions } from './stores/file-store.js';
export { SqlTaskStore, toMatchQuery } from './stores/sql-store.js';
export type { SqlTaskStoreOptions } from './stores/sql-store.js';

// Repository & service
export { TaskRepository } from './repository/task-repository.js';
export { TaskService, parseTaskId, validateTaskFields } from './services/task-service.js';

// Configuration & logging
export { StoreBackend, loadConfig, getDefaultHomeDir, parseBackend } from './config.js';
export type { AppConfig, ConfigOverrides } from './config.js';
export { createLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogConfig, LogLevel } from './logger.js';

// Factory
export { createStore, createTaskService } from './factory.js';
