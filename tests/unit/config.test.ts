import {
     intFromEnv,
     loadDispatcherConfig,
     loadReservationConfig,
     loadSweeperConfig,
     loadTransactionConfig,
} from '@stockledger/shared/src/utils/config';

describe('Configuration', () => {
     const saved = { ...process.env };

     afterEach(() => {
          process.env = { ...saved };
     });

     describe('intFromEnv', () => {
          it('should parse integers', () => {
               process.env.TEST_INT = '42';
               expect(intFromEnv('TEST_INT', 7)).toBe(42);
          });

          it('should fall back when unset, empty or not a number', () => {
               delete process.env.TEST_INT;
               expect(intFromEnv('TEST_INT', 7)).toBe(7);
               process.env.TEST_INT = '';
               expect(intFromEnv('TEST_INT', 7)).toBe(7);
               process.env.TEST_INT = 'abc';
               expect(intFromEnv('TEST_INT', 7)).toBe(7);
          });
     });

     it('should use defaults', () => {
          delete process.env.RESERVATION_TTL_MINUTES;
          delete process.env.SWEEP_INTERVAL_MS;
          delete process.env.SWEEP_BATCH_SIZE;
          delete process.env.DB_LOCK_TIMEOUT_MS;
          delete process.env.DB_TX_RETRIES;
          delete process.env.DB_TX_RETRY_BASE_MS;
          delete process.env.EVENT_BATCH_SIZE;
          delete process.env.EVENT_POLL_INTERVAL_MS;
          delete process.env.EVENT_MAX_RETRIES;

          expect(loadReservationConfig()).toEqual({ defaultTtlMinutes: 30 });
          expect(loadSweeperConfig()).toEqual({ intervalMs: 60000, batchSize: 200 });
          expect(loadTransactionConfig()).toEqual({ lockTimeoutMs: 2000, retries: 3, retryBaseMs: 50 });
          expect(loadDispatcherConfig()).toEqual({ batchSize: 100, pollIntervalMs: 200, maxRetries: 5 });
     });

     it('should read overrides from the environment', () => {
          process.env.RESERVATION_TTL_MINUTES = '15';
          process.env.SWEEP_INTERVAL_MS = '5000';
          process.env.DB_TX_RETRIES = '0';

          expect(loadReservationConfig().defaultTtlMinutes).toBe(15);
          expect(loadSweeperConfig().intervalMs).toBe(5000);
          expect(loadTransactionConfig().retries).toBe(0);
     });
});
