/**
 * Environment-driven configuration, validated once at startup.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_BUSY_TIMEOUT_MS } from './db.js';

export const StoreBackend = {
  File: 'file',
  Sqlite: 'sqlite',
} as const;

export type StoreBackend = (typeof StoreBackend)[keyof typeof StoreBackend];

export interface AppConfig {
  readonly backend: StoreBackend;
  readonly homeDir: string;
  readonly filePath: string;
  readonly dbPath: string;
  readonly busyTimeoutMs: number;
  readonly logLevel: LogLevel;
  readonly logFile: string;
}

/** Values that take precedence over the environment (CLI flags) */
export type ConfigOverrides = Partial<Pick<AppConfig, 'backend' | 'filePath' | 'dbPath'>>;

const IN_MEMORY_DB = ':memory:';

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const envSchema = z.object({
  TASKKEEPER_HOME: z.preprocess(blankToUndefined, z.string().optional()),
  TASKKEEPER_BACKEND: z.preprocess(blankToUndefined, z.enum([StoreBackend.File, StoreBackend.Sqlite]).default(StoreBackend.File)),
  TASKKEEPER_FILE: z.preprocess(blankToUndefined, z.string().optional()),
  TASKKEEPER_DB: z.preprocess(blankToUndefined, z.string().optional()),
  TASKKEEPER_BUSY_TIMEOUT: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT_MS),
  ),
  TASKKEEPER_LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
  TASKKEEPER_LOG_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

/** Returns the platform-appropriate default data directory */
export function getDefaultHomeDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', 'taskkeeper');
  }
  if (platform === 'win32') {
    return join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'taskkeeper');
  }
  // Linux / other
  return join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'taskkeeper');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const homeDir = vars.TASKKEEPER_HOME ?? getDefaultHomeDir(env);
  const dbPath = overrides.dbPath ?? vars.TASKKEEPER_DB ?? join(homeDir, 'taskkeeper.db');

  // Each operation opens its own connection, so an in-memory database would be empty every time
  if (dbPath.trim() === IN_MEMORY_DB) {
    throw new ConfigError(`Invalid configuration: database path '${IN_MEMORY_DB}' is not supported, use a file path`);
  }

  return {
    backend: overrides.backend ?? vars.TASKKEEPER_BACKEND,
    homeDir,
    filePath: overrides.filePath ?? vars.TASKKEEPER_FILE ?? join(homeDir, 'tasks.json'),
    dbPath,
    busyTimeoutMs: vars.TASKKEEPER_BUSY_TIMEOUT,
    logLevel: vars.TASKKEEPER_LOG_LEVEL,
    logFile: vars.TASKKEEPER_LOG_FILE ?? join(homeDir, 'taskkeeper.log'),
  };
}

/** Parse a backend name given on the command line */
export function parseBackend(value: string): StoreBackend {
  const normalized = value.trim().toLowerCase();
  if (normalized === StoreBackend.File || normalized === 'json') return StoreBackend.File;
  if (normalized === StoreBackend.Sqlite || normalized === 'sql' || normalized === 'db') return StoreBackend.Sqlite;
  throw new ConfigError(`Unknown storage backend '${value}' (expected 'file' or 'sqlite')`);
}
