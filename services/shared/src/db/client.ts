import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';
import { loadTransactionConfig } from '../utils/config';
import {
     CommitOutcomeUnknownError,
     ConcurrentModificationError,
     DomainError,
     PersistenceFailureError,
     TransientError,
} from '../utils/errors';

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
};
export const pool = new Pool(config);

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

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

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
     isolationLevel?: IsolationLevel;
     /** Upper bound on waiting for a row lock; 0 disables the bound. */
     lockTimeoutMs?: number;
}

export interface RetryOptions extends TransactionOptions {
     retries?: number;
     retryBaseMs?: number;
}

// Transaction helper
export async function withTransaction<T>(
     fn: (client: PoolClient) => Promise<T>,
     options: TransactionOptions = {}
): Promise<T> {
     const client = await pool.connect();
     let committing = false;
     try {
          await client.query(`BEGIN ISOLATION LEVEL ${options.isolationLevel ?? 'READ COMMITTED'}`);
          if (options.lockTimeoutMs && options.lockTimeoutMs > 0) {
               await client.query(`SELECT set_config('lock_timeout', $1, true)`, [
                    `${options.lockTimeoutMs}ms`,
               ]);
          }
          const result = await fn(client);
          committing = true;
          await client.query('COMMIT');
          client.release();
          return result;
     } catch (err) {
          if (committing) {
               // The server may have committed before the connection dropped
               if (classifyDatabaseError(err) instanceof PersistenceFailureError) {
                    client.release(true);
                    logger.error({ err }, 'Connection lost during COMMIT, outcome unknown');
                    throw new CommitOutcomeUnknownError(undefined, err);
               }
               client.release();
               throw err;
          }
          try {
               await client.query('ROLLBACK');
               client.release();
          } catch (rollbackError) {
               logger.error({ err: rollbackError }, 'Rollback failed, discarding connection');
               client.release(true);
          }
          throw err;
     }
}

const CONFLICT_CODES = new Set(['40001', '40P01', '55P03']);
const CONNECTION_CODES = new Set([
     'ECONNREFUSED',
     'ECONNRESET',
     'ETIMEDOUT',
     'EPIPE',
     '57P01',
     '57P02',
     '57P03',
     '53300',
]);

function errorCode(error: unknown): string | undefined {
     if (typeof error === 'object' && error !== null && 'code' in error) {
          const { code } = error;
          return typeof code === 'string' ? code : undefined;
     }
     return undefined;
}

/**
 * Maps a driver error onto the transient taxonomy. Returns null for anything that
 * must not be retried (constraint violations, syntax errors, domain errors).
 */
export function classifyDatabaseError(error: unknown): TransientError | null {
     if (error instanceof TransientError) {
          return error;
     }
     if (error instanceof DomainError) {
          return null;
     }

     const code = errorCode(error);
     if (code && CONFLICT_CODES.has(code)) {
          return new ConcurrentModificationError(undefined, error);
     }
     if (code && (CONNECTION_CODES.has(code) || code.startsWith('08'))) {
          return new PersistenceFailureError(undefined, error);
     }
     if (error instanceof Error && /timeout exceeded when trying to connect|Connection terminated/i.test(error.message)) {
          return new PersistenceFailureError(undefined, error);
     }
     return null;
}

export function backoffDelay(attempt: number, baseMs: number): number {
     return baseMs * 2 ** attempt + Math.floor(Math.random() * baseMs);
}

function sleep(ms: number): Promise<void> {
     return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs fn in a transaction, retrying lock conflicts and dropped connections with
 * exponential backoff. Exhausted retries surface as ConcurrentModificationError or
 * PersistenceFailureError; every other error is rethrown on the first attempt, including
 * CommitOutcomeUnknownError.
 */
export async function withTransactionRetry<T>(
     fn: (client: PoolClient) => Promise<T>,
     options: RetryOptions = {}
): Promise<T> {
     const defaults = loadTransactionConfig();
     const retries = options.retries ?? defaults.retries;
     const retryBaseMs = options.retryBaseMs ?? defaults.retryBaseMs;
     const txOptions: TransactionOptions = {
          isolationLevel: options.isolationLevel,
          lockTimeoutMs: options.lockTimeoutMs ?? defaults.lockTimeoutMs,
     };

     for (let attempt = 0; ; attempt++) {
          try {
               return await withTransaction(fn, txOptions);
          } catch (error) {
               const transient = classifyDatabaseError(error);
               if (!transient) {
                    throw error;
               }
               if (attempt >= retries) {
                    logger.error(
                         { err: error, code: transient.code, attempts: attempt + 1 },
                         'Transaction retries exhausted'
                    );
                    throw transient;
               }

               const delay = backoffDelay(attempt, retryBaseMs);
               logger.warn(
                    { code: transient.code, attempt: attempt + 1, delayMs: delay },
                    'Transient database failure, retrying transaction'
               );
               await sleep(delay);
          }
     }
}

// Graceful shutdown
export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
