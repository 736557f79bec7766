/**
 * CLI helpers: global options, status parsing, error handling.
 */

import type { Command } from 'commander';
import type { ConfigOverrides, Logger, TaskService, TaskStatus as TaskStatusType } from '@taskkeeper/core';
import { TaskStatus, ValidationError, isTaskKeeperError, parseBackend } from '@taskkeeper/core';
import * as out from './output.js';

/** Options accepted by the root command */
export type GlobalOptions = {
  backend?: string;
  file?: string;
  db?: string;
};

/** What every command needs from the entry point */
export interface CliContext {
  /** Build the service for one invocation from its global options */
  createService(options: GlobalOptions): TaskService;
  logger: Logger;
  /** Receives 1 when a command fails */
  exit(code: number): void;
}

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred. Check the log file for details.';

export function globalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

/** Service for the command being run, honouring --backend/--file/--db */
export function serviceFor(ctx: CliContext, cmd: Command): TaskService {
  return ctx.createService(globalOptions(cmd));
}

export function toOverrides(options: GlobalOptions): ConfigOverrides {
  return {
    backend: options.backend != null ? parseBackend(options.backend) : undefined,
    filePath: options.file,
    dbPath: options.db,
  };
}

/**
 * Parse a status string into a TaskStatus value.
 */
export function parseStatus(status: string): TaskStatusType | null {
  switch (status.trim().toLowerCase()) {
    case 'pending': case 'todo': return TaskStatus.Pending;
    case 'done': case 'complete': case 'completed': return TaskStatus.Completed;
    default: return null;
  }
}

/** Like parseStatus, but an unknown value is a ValidationError */
export function parseStatusOption(status: string | undefined): TaskStatusType | undefined {
  if (status == null) return undefined;
  const parsed = parseStatus(status);
  if (parsed == null) {
    throw new ValidationError(`Unknown status '${status}' (expected pending or completed)`);
  }
  return parsed;
}

/**
 * Run a command action. Known errors are printed as `Error: <message>`;
 * anything else is logged and reported generically. Both exit with 1.
 */
export function $try(ctx: CliContext, fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    if (isTaskKeeperError(err)) {
      out.error(`Error: ${err.message}`);
    } else {
      ctx.logger.error({ err }, 'Unexpected error in command');
      out.error(UNEXPECTED_ERROR_MESSAGE);
    }
    ctx.exit(1);
  }
}
