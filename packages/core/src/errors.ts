/**
 * Error taxonomy shared by every layer.
 *
 * The service raises ValidationError and NotFoundError; stores and the
 * repository raise PersistenceError, always with the backend failure attached
 * as `cause`. Nothing backend-specific is thrown past the repository.
 */

export type ErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'PERSISTENCE' | 'CONFIG';

export abstract class TaskKeeperError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input violates a field or identifier constraint */
export class ValidationError extends TaskKeeperError {
  readonly code = 'VALIDATION';
}

/** A well-formed id matches no live record */
export class NotFoundError extends TaskKeeperError {
  readonly code = 'NOT_FOUND';

  constructor(readonly taskId: number) {
    super(`Task with ID ${taskId} not found`);
  }
}

/** The store could not complete an I/O or query operation */
export class PersistenceError extends TaskKeeperError {
  readonly code = 'PERSISTENCE';
}

export class ConfigError extends TaskKeeperError {
  readonly code = 'CONFIG';
}

export function isTaskKeeperError(err: unknown): err is TaskKeeperError {
  return err instanceof TaskKeeperError;
}

/** Message text of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
