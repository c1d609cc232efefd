/**
 * @hoist/shared - Error Classes
 * Structured error handling for deploy and rollback runs
 */

export class HoistError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HoistError';
    this.code = code;
    this.details = details;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HoistError);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ValidationError extends HoistError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILED', details);
    this.name = 'ValidationError';
  }
}

/**
 * A command exited non-zero, was killed by a signal, or could not be spawned.
 * `exitCode` is null for the last two.
 */
export class ExecutionError extends HoistError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_FAILED', { ...details, exitCode });
    this.name = 'ExecutionError';
    this.exitCode = exitCode;
  }
}

export class DockerfileNotFoundError extends HoistError {
  constructor(path: string) {
    super(`${path} not found`, 'DOCKERFILE_NOT_FOUND', { path });
    this.name = 'DockerfileNotFoundError';
  }
}

export class ContainerNotRunningError extends HoistError {
  constructor(containerName: string, status: string) {
    super(`Container ${containerName} failed to start properly`, 'CONTAINER_NOT_RUNNING', {
      containerName,
      status,
    });
    this.name = 'ContainerNotRunningError';
  }
}

export class NoPreviousVersionError extends HoistError {
  constructor(found: number) {
    super('No previous version found to rollback to', 'NO_PREVIOUS_VERSION', { found });
    this.name = 'NoPreviousVersionError';
  }
}

export class PreviousVersionNotFoundError extends HoistError {
  constructor(currentImage: string) {
    super(
      `Could not find a version older than ${currentImage} to rollback to`,
      'PREVIOUS_VERSION_NOT_FOUND',
      { currentImage },
    );
    this.name = 'PreviousVersionNotFoundError';
  }
}

/** The swap failed but the backup container is live again. */
export class RollbackRestoredError extends HoistError {
  public readonly original: HoistError;

  constructor(original: HoistError) {
    super(
      `Rollback failed, restored previous container: ${original.message}`,
      'ROLLBACK_FAILED_RESTORED',
      { original: original.toJSON() },
    );
    this.name = 'RollbackRestoredError';
    this.original = original;
  }
}

/** The swap failed and putting the backup back failed too. Needs an operator. */
export class RollbackRestoreFailedError extends HoistError {
  public readonly original: HoistError;
  public readonly restore: HoistError;

  constructor(original: HoistError, restore: HoistError) {
    super(
      `Rollback failed and restore failed: ${restore.message} (original error: ${original.message})`,
      'ROLLBACK_FAILED_RESTORE_FAILED',
      { original: original.toJSON(), restore: restore.toJSON() },
    );
    this.name = 'RollbackRestoreFailedError';
    this.original = original;
    this.restore = restore;
  }
}

export class LogWriteError extends HoistError {
  constructor(path: string, reason: string) {
    super(`Cannot write log file ${path}: ${reason}`, 'LOG_WRITE_FAILED', { path });
    this.name = 'LogWriteError';
  }
}

/** Wrap anything thrown by a step so results always carry a HoistError. */
export function toHoistError(error: unknown): HoistError {
  if (error instanceof HoistError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new HoistError(message, 'UNEXPECTED');
}
