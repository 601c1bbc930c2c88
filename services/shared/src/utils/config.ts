// Environment-driven settings shared by the services. Entry points call dotenv.config() first.

export function intFromEnv(name: string, fallback: number): number {
     const raw = process.env[name];
     if (raw === undefined || raw === '') {
          return fallback;
     }
     const parsed = parseInt(raw, 10);
     return Number.isNaN(parsed) ? fallback : parsed;
}

export interface ReservationConfig {
     defaultTtlMinutes: number;
}

export interface SweeperConfig {
     intervalMs: number;
     batchSize: number;
}

export interface TransactionConfig {
     lockTimeoutMs: number;
     retries: number;
     retryBaseMs: number;
}

export interface DispatcherConfig {
     batchSize: number;
     pollIntervalMs: number;
     maxRetries: number;
}

export function loadReservationConfig(): ReservationConfig {
     return {
          defaultTtlMinutes: intFromEnv('RESERVATION_TTL_MINUTES', 30),
     };
}

export function loadSweeperConfig(): SweeperConfig {
     return {
          intervalMs: intFromEnv('SWEEP_INTERVAL_MS', 60_000),
          batchSize: intFromEnv('SWEEP_BATCH_SIZE', 200),
     };
}

export function loadTransactionConfig(): TransactionConfig {
     return {
          lockTimeoutMs: intFromEnv('DB_LOCK_TIMEOUT_MS', 2000),
          retries: intFromEnv('DB_TX_RETRIES', 3),
          retryBaseMs: intFromEnv('DB_TX_RETRY_BASE_MS', 50),
     };
}

export function loadDispatcherConfig(): DispatcherConfig {
     return {
          batchSize: intFromEnv('EVENT_BATCH_SIZE', 100),
          pollIntervalMs: intFromEnv('EVENT_POLL_INTERVAL_MS', 200),
          maxRetries: intFromEnv('EVENT_MAX_RETRIES', 5),
     };
}
