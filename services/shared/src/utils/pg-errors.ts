// SQLSTATE classification for errors raised by node-postgres

const CONFLICT_CODES = new Set([
     '40001', // serialization_failure
     '40P01', // deadlock_detected
     '55P03', // lock_not_available (lock_timeout)
]);

const CONNECTION_CODES = new Set(['57P01', '57P02', '57P03']);

const SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

export const UNIQUE_VIOLATION = '23505';

function errorCode(error: unknown): string | undefined {
     if (typeof error === 'object' && error !== null && 'code' in error) {
          const { code } = error;
          return typeof code === 'string' ? code : undefined;
     }
     return undefined;
}

export function isConcurrencyConflict(error: unknown): boolean {
     const code = errorCode(error);
     return code !== undefined && CONFLICT_CODES.has(code);
}

export function isConnectionFailure(error: unknown): boolean {
     const code = errorCode(error);
     if (code === undefined) {
          return (
               error instanceof Error &&
               /Connection terminated|timeout exceeded when trying to connect/i.test(error.message)
          );
     }
     return code.startsWith('08') || CONNECTION_CODES.has(code) || SOCKET_CODES.has(code);
}

/**
 * True when the error is a unique violation, optionally on a specific constraint.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
     if (errorCode(error) !== UNIQUE_VIOLATION) {
          return false;
     }
     if (constraint === undefined) {
          return true;
     }
     return (
          typeof error === 'object' &&
          error !== null &&
          'constraint' in error &&
          error.constraint === constraint
     );
}
