export type ErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'INVALID_CATEGORY'
  | 'INVALID_PHASE'
  | 'MISSING_ARGUMENT'
  | 'INVALID_ARGUMENT'
  | 'STORAGE_UNWRITABLE'
  | 'FINDING_COLLISION'
  | 'WAIT_TIMEOUT'
  | 'INVALID_CONFIG';

export class MailroomError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SessionNotFoundError extends MailroomError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session not found: ${sessionId}`);
    this.sessionId = sessionId;
  }
}

export class InvalidCategoryError extends MailroomError {
  constructor(category: string) {
    super('INVALID_CATEGORY', `Invalid category "${category}". Must be: web, fetch, or local`);
  }
}

export class InvalidPhaseError extends MailroomError {
  constructor(phase: string, allowed: readonly string[]) {
    super('INVALID_PHASE', `Invalid phase "${phase}". Must be one of: ${allowed.join(', ')}`);
  }
}

export class MissingArgumentError extends MailroomError {
  constructor(usage: string) {
    super('MISSING_ARGUMENT', `Missing required arguments. Usage: ${usage}`);
  }
}

export class InvalidArgumentError extends MailroomError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** Retryable: the storage root (or something under it) refused a write. */
export class StorageUnwritableError extends MailroomError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE_UNWRITABLE', `Storage not writable at ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class FindingCollisionError extends MailroomError {
  readonly path: string;

  constructor(path: string) {
    super('FINDING_COLLISION', `Finding already exists: ${path}`);
    this.path = path;
  }
}

export class WaitTimeoutError extends MailroomError {
  constructor(sessionId: string, expected: number, found: number, timeoutMs: number) {
    super('WAIT_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${expected} finding(s) in session ${sessionId} (found ${found})`);
  }
}

export class InvalidConfigError extends MailroomError {
  constructor(key: string, value: string, allowed: string) {
    super('INVALID_CONFIG', `Invalid value "${value}" for ${key}. Expected ${allowed}`);
  }
}

const UNWRITABLE_CODES = new Set(['EACCES', 'EPERM', 'EROFS', 'ENOSPC', 'ENOTDIR', 'EEXIST']);

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function storageError(path: string, err: unknown): unknown {
  const code = errnoCode(err);
  return code !== undefined && UNWRITABLE_CODES.has(code) ? new StorageUnwritableError(path, err) : err;
}

/** Runs a write, translating storage-level failures into StorageUnwritableError. */
export function guardWrite<T>(path: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw storageError(path, err);
  }
}
