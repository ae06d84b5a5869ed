export type ErrorMeta = Record<string, unknown>;

export type ConfschedErrorCode =
  | 'FETCH_FAILED'
  | 'RECONCILIATION'
  | 'STORAGE'
  | 'SNAPSHOT_NOT_FOUND'
  | 'SYNC_RUNNING'
  | 'SYNC_ABORTED';

/**
 * Base class for failures the sync and calendar paths report to callers.
 * `code` is stable and safe to branch on; `meta` carries the offending values.
 */
export class ConfschedError extends Error {
  constructor(
    public readonly code: ConfschedErrorCode,
    message: string,
    public readonly meta: ErrorMeta = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class FetchError extends ConfschedError {
  constructor(
    message: string,
    public readonly transient: boolean,
    meta: ErrorMeta & { url?: string; status?: number } = {},
    public readonly retryAfterMs: number | null = null,
  ) {
    super('FETCH_FAILED', message, meta);
  }
}

export class ReconciliationError extends ConfschedError {
  constructor(message: string, record: unknown) {
    super('RECONCILIATION', message, { record });
  }
}

export class StorageError extends ConfschedError {
  constructor(message: string, meta: ErrorMeta = {}) {
    super('STORAGE', message, meta);
  }
}

export class SnapshotNotFoundError extends ConfschedError {
  constructor(filePath: string) {
    super('SNAPSHOT_NOT_FOUND', 'No synchronized schedule found.', {
      filePath,
    });
  }
}

export class SyncAlreadyRunningError extends ConfschedError {
  constructor(meta: ErrorMeta) {
    super('SYNC_RUNNING', 'A sync is already running.', meta);
  }
}

export class SyncAbortedError extends ConfschedError {
  constructor() {
    super('SYNC_ABORTED', 'Sync was aborted.');
  }
}

export function isErrnoException(
  err: unknown,
  code: string,
): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    'code' in err &&
    (err as { code?: unknown }).code === code
  );
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function serializeError(err: unknown): ErrorMeta {
  if (err instanceof ConfschedError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { message: String(err) };
}
