/**
 * PostgreSQL error inspection.
 *
 * pg surfaces server errors as plain Errors with extra fields (code,
 * constraint, detail); these helpers read them without casting.
 */

/** SQLSTATE codes the repositories react to */
export const PgErrorCodes = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  CHECK_VIOLATION: '23514',
} as const;

function readField(error: unknown, field: string): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * SQLSTATE of a pg error, if any
 */
export function getPgErrorCode(error: unknown): string | undefined {
  return readField(error, 'code');
}

/**
 * True for a unique violation, optionally on one named constraint or index
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (getPgErrorCode(error) !== PgErrorCodes.UNIQUE_VIOLATION) {
    return false;
  }
  return constraint === undefined || readField(error, 'constraint') === constraint;
}

/**
 * Map database errors to generic messages for client exposure
 */
export function sanitizeDBError(error: Error): string {
  const message = error.message.toLowerCase();

  if (message.includes('connection') || message.includes('econnrefused')) {
    return 'Database connection error. Please try again later.';
  }
  if (message.includes('timeout')) {
    return 'Database query timeout. Please try again later.';
  }
  if (getPgErrorCode(error) === PgErrorCodes.UNIQUE_VIOLATION) {
    return 'A record with this information already exists.';
  }
  if (getPgErrorCode(error) === PgErrorCodes.FOREIGN_KEY_VIOLATION) {
    return 'Referenced record does not exist.';
  }
  return 'An unexpected database error occurred. Please try again later.';
}
