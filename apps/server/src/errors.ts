export class ValidationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ImportError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ImportError';
  }
}

// The replacement set was not derived from the current, unfiltered store.
export class RevisionConflictError extends Error {
  readonly status = 409;

  constructor(readonly expected: string, readonly received: string | null) {
    super('transactions changed or were filtered since they were read; reload before saving');
    this.name = 'RevisionConflictError';
  }
}

export class CapabilityUnavailableError extends Error {
  readonly status = 503;

  constructor(readonly capability: 'pdf' | 'mail', reason: string) {
    super(`${capability} is unavailable: ${reason}`);
    this.name = 'CapabilityUnavailableError';
  }
}

// Memory already holds the change; the file does not.
export class PersistError extends Error {
  readonly status = 500;

  constructor(readonly file: string, cause: unknown) {
    super(`failed to write ${file}`, { cause });
    this.name = 'PersistError';
  }
}

export type LedgerError =
  | ValidationError
  | ImportError
  | RevisionConflictError
  | CapabilityUnavailableError
  | PersistError;

export function isLedgerError(error: unknown): error is LedgerError {
  return (
    error instanceof ValidationError ||
    error instanceof ImportError ||
    error instanceof RevisionConflictError ||
    error instanceof CapabilityUnavailableError ||
    error instanceof PersistError
  );
}
