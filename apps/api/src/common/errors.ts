export interface ValidationIssue {
  path: (string | number)[];
  message: string;
}

export abstract class DomainError extends Error {
  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input that is malformed or out of range. */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    readonly issues: ValidationIssue[] = [],
  ) {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  constructor(
    readonly resource: string,
    readonly id: string,
  ) {
    super(`${resource} not found`);
  }
}

/** Persistence failure. The message is for logs, never for API clients. */
export class StorageError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
