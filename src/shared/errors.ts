/**
 * Error taxonomy for pipeline runs.
 *
 * Every thrown error carries a stable `code` so the controller and the run
 * history can classify a failure without string matching on messages.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'SECRET_FETCH_FAILED'
  | 'STAGE_EXECUTION_FAILED'
  | 'CLONE_FAILED'
  | 'PATCH_APPLY_FAILED'
  | 'COMMIT_PUSH_FAILED'
  | 'SYNC_IN_PROGRESS';

export class TagflowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TagflowError';
    this.code = code;
  }
}

export class ConfigError extends TagflowError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
    this.name = 'ConfigError';
  }
}

/** Raised before a stage body runs when one of its declared secrets cannot be fetched. */
export class SecretFetchError extends TagflowError {
  readonly secretPath: string;

  constructor(secretPath: string, reason: string, options?: { cause?: unknown }) {
    super('SECRET_FETCH_FAILED', `Failed to fetch secret ${secretPath}: ${reason}`, options);
    this.name = 'SecretFetchError';
    this.secretPath = secretPath;
  }
}

/** A child process exited non-zero, timed out, or could not be started. */
export class StageExecutionError extends TagflowError {
  readonly exitCode: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: { exitCode?: number | null; timedOut?: boolean } = {},
    options?: { cause?: unknown },
  ) {
    super('STAGE_EXECUTION_FAILED', message, options);
    this.name = 'StageExecutionError';
    this.exitCode = details.exitCode ?? null;
    this.timedOut = details.timedOut ?? false;
  }
}

export class RepositorySyncError extends TagflowError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'RepositorySyncError';
  }
}

export class CloneError extends RepositorySyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLONE_FAILED', message, options);
    this.name = 'CloneError';
  }
}

/** The manifest no longer contains the expected image line (repository drift). */
export class PatchApplyError extends RepositorySyncError {
  readonly manifestPath: string;

  constructor(manifestPath: string, message: string) {
    super('PATCH_APPLY_FAILED', message);
    this.name = 'PatchApplyError';
    this.manifestPath = manifestPath;
  }
}

export class CommitPushError extends RepositorySyncError {
  readonly rejected: boolean;

  constructor(message: string, details: { rejected?: boolean } = {}, options?: { cause?: unknown }) {
    super('COMMIT_PUSH_FAILED', message, options);
    this.name = 'CommitPushError';
    this.rejected = details.rejected ?? false;
  }
}

export class SyncInProgressError extends TagflowError {
  constructor(clonePath: string) {
    super('SYNC_IN_PROGRESS', `Another sync is already using ${clonePath}`);
    this.name = 'SyncInProgressError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
