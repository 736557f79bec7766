import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import { StoreBackend } from './config.js';
import type { TaskStore } from './stores/task-store.js';
import { FileTaskStore } from './stores/file-store.js';
import { SqlTaskStore } from './stores/sql-store.js';
import { TaskRepository } from './repository/task-repository.js';
import { TaskService } from './services/task-service.js';
import { silentLogger } from './logger.js';

/** Build the store selected by `config.backend` */
export function createStore(config: AppConfig, logger: Logger = silentLogger()): TaskStore {
  switch (config.backend) {
    case StoreBackend.File:
      return new FileTaskStore({ filePath: config.filePath, logger });
    case StoreBackend.Sqlite:
      return new SqlTaskStore({ path: config.dbPath, busyTimeoutMs: config.busyTimeoutMs, logger });
  }
}

/** Wire store, repository and service for one configuration */
export function createTaskService(config: AppConfig, logger: Logger = silentLogger()): TaskService {
  const repository = new TaskRepository(createStore(config, logger));
  return new TaskService(repository, logger);
}
