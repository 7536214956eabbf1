/**
 * Raised when a request fails validation. `issues` holds one message per
 * rejected field, in the order they were checked.
 */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join(' '));
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Raised when the offerings table cannot be read or a record is malformed
 */
export class DataTableError extends Error {
  readonly recordIndex: number | null;

  constructor(message: string, recordIndex: number | null = null) {
    super(recordIndex === null ? message : `Record ${recordIndex}: ${message}`);
    this.name = 'DataTableError';
    this.recordIndex = recordIndex;
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}
