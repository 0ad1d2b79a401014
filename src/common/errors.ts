/**
 * Application errors.
 *
 * Anything thrown as an AppError is rendered by the global error handler as
 * { ok: false, error: code, message, details? } with its own status code.
 */

export interface FieldError {
  field: string;
  message: string;
}

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(public readonly details: FieldError[]) {
    super(422, 'VALIDATION_ERROR', describeFields(details));
  }
}

export class StorageError extends AppError {
  constructor(message: string) {
    super(500, 'STORAGE_ERROR', message);
  }
}

export class SourceUnreadableError extends AppError {
  constructor(path: string, reason: string) {
    super(500, 'SOURCE_UNREADABLE', `Failed to read source file ${path}: ${reason}`);
  }
}

export class MissingColumnsError extends AppError {
  constructor(
    public readonly required: readonly string[],
    public readonly found: readonly string[]
  ) {
    super(
      422,
      'MISSING_COLUMNS',
      `Missing required columns. Needed: ${required.join(', ')}. Found: ${found.join(', ') || '(none)'}`
    );
  }
}

export class NoValidRowsError extends AppError {
  constructor() {
    super(422, 'NO_VALID_ROWS', 'No valid data remaining after cleaning');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeFields(details: FieldError[]): string {
  if (details.length === 0) return 'Invalid request';
  return details.map((d) => `${d.field}: ${d.message}`).join('; ');
}
