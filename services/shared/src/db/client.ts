import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';
import { Result, err } from '../utils/result';
import { ConcurrencyConflictError, DatabaseUnavailableError } from '../utils/errors';
import { isConcurrencyConflict, isConnectionFailure } from '../utils/pg-errors';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // In test mode, use minimal connections and short timeouts
     min: process.env.NODE_ENV === 'test' ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: process.env.NODE_ENV === 'test' ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis:
          process.env.NODE_ENV === 'test'
               ? 100
               : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
     application_name: process.env.SERVICE_NAME || 'lot-ledger',
};
export const pool = new Pool(config);

// Log pool errors
pool.on('error', (error) => {
     logger.error({ err: error }, 'Unexpected PostgreSQL pool error');
});

export interface LedgerTransactionOptions {
     /** Longest wait for a row lock before the attempt is abandoned */
     lockTimeoutMs?: number;
     /** Caller-imposed deadline for any single statement */
     statementTimeoutMs?: number;
     /** Attempts made for conflicts and connection failures */
     maxRetries?: number;
     retryDelayMs?: number;
}

const defaultLedgerOptions: Required<LedgerTransactionOptions> = {
     lockTimeoutMs: parseInt(process.env.DB_LOCK_TIMEOUT_MS || '5000', 10),
     statementTimeoutMs: parseInt(process.env.DB_STATEMENT_TIMEOUT_MS || '15000', 10),
     maxRetries: parseInt(process.env.TX_MAX_RETRIES || '3', 10),
     retryDelayMs: parseInt(process.env.TX_RETRY_DELAY_MS || '50', 10),
};

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (error) {
          await client.query('ROLLBACK');
          throw error;
     } finally {
          client.release();
     }
}

// A connection lost while COMMIT is in flight leaves the outcome unknown:
// the transaction may have landed, so it must not be run again.
async function commit(client: PoolClient): Promise<void> {
     try {
          await client.query('COMMIT');
     } catch (error) {
          if (isConnectionFailure(error)) {
               throw new DatabaseUnavailableError(
                    'Connection lost during commit, the outcome is unknown',
                    error,
                    true
               );
          }
          throw error;
     }
}

async function runLedgerAttempt<T, E>(
     fn: (client: PoolClient) => Promise<Result<T, E>>,
     options: Required<LedgerTransactionOptions>
): Promise<Result<T, E>> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          await client.query(
               `SELECT set_config('lock_timeout', $1, true), set_config('statement_timeout', $2, true)`,
               [`${options.lockTimeoutMs}ms`, `${options.statementTimeoutMs}ms`]
          );
          const result = await fn(client);
          if (!result.ok) {
               await client.query('ROLLBACK');
               return result;
          }
          await commit(client);
          return result;
     } catch (error) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               logger.warn({ err: rollbackError }, 'Rollback failed after transaction error');
          }
          throw error;
     } finally {
          client.release();
     }
}

/**
 * Run a ledger operation in its own transaction. A failed result rolls
 * back every write the operation made; lock conflicts and lost connections
 * are retried with backoff before being reported.
 */
export async function withLedgerTransaction<T, E>(
     fn: (client: PoolClient) => Promise<Result<T, E>>,
     options: LedgerTransactionOptions = {}
): Promise<Result<T, E | ConcurrencyConflictError>> {
     const settings = { ...defaultLedgerOptions, ...options };
     const attempts = Math.max(1, settings.maxRetries);

     for (let attempt = 1; ; attempt++) {
          try {
               return await runLedgerAttempt(fn, settings);
          } catch (error) {
               if (error instanceof DatabaseUnavailableError) {
                    logger.error(
                         { err: error.originalError, outcomeUnknown: error.outcomeUnknown },
                         'Ledger transaction interrupted'
                    );
                    throw error;
               }

               const conflict = isConcurrencyConflict(error);
               const connectionLost = !conflict && isConnectionFailure(error);

               if (!conflict && !connectionLost) {
                    throw error;
               }

               if (attempt >= attempts) {
                    if (conflict) {
                         logger.warn({ err: error, attempts: attempt }, 'Ledger transaction conflict');
                         return err(
                              new ConcurrencyConflictError(
                                   `Transaction aborted by a conflicting update after ${attempt} attempt(s)`,
                                   attempt
                              )
                         );
                    }
                    logger.error({ err: error, attempts: attempt }, 'Database unavailable');
                    throw new DatabaseUnavailableError('Database is unavailable', error);
               }

               const delay = settings.retryDelayMs * 2 ** (attempt - 1);
               logger.warn(
                    { err: error, attempt, delay, reason: conflict ? 'conflict' : 'connection' },
                    'Retrying ledger transaction'
               );
               await new Promise<void>((resolve) => setTimeout(resolve, delay));
          }
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     try {
          const client = await pool.connect();
          try {
               return await fn(client);
          } finally {
               client.release();
          }
     } catch (error) {
          if (isConnectionFailure(error)) {
               throw new DatabaseUnavailableError('Database is unavailable', error);
          }
          throw error;
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closePool();
          process.exit(0);
     });

     process.on('SIGTERM', async () => {
          await closePool();
          process.exit(0);
     });
}
