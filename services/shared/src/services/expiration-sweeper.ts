import { StockStore } from '../stores/stock-store';
import { ExpiryCursor, SweepResult } from '../types/inventory.types';
import { ReservationInactiveError } from '../utils/errors';
import { loadSweeperConfig, SweeperConfig } from '../utils/config';
import { createChildLogger } from '../utils/logger';
import { ReservationService } from './reservation-service';

const log = createChildLogger({ component: 'expiration-sweeper' });

export interface ExpirationSweeperOptions extends Partial<SweeperConfig> {
     clock?: () => Date;
}

/**
 * Returns stock held by reservations whose TTL has passed. Each reservation is expired
 * in its own transaction, so one failure never blocks the rest of the batch, and a batch
 * that had failures is followed by the next page rather than the same rows.
 */
export class ExpirationSweeper {
     private readonly intervalMs: number;
     private readonly batchSize: number;
     private readonly clock: () => Date;

     private timer: NodeJS.Timeout | null = null;
     private inFlight: Promise<void> | null = null;
     private cursor: ExpiryCursor | null = null;
     private running = false;

     constructor(
          private readonly store: StockStore,
          private readonly reservations: ReservationService,
          options: ExpirationSweeperOptions = {}
     ) {
          const defaults = loadSweeperConfig();
          this.intervalMs = options.intervalMs ?? defaults.intervalMs;
          this.batchSize = options.batchSize ?? defaults.batchSize;
          this.clock = options.clock ?? (() => new Date());
     }

     async sweepOnce(now: Date = this.clock()): Promise<SweepResult> {
          const expired = await this.store.findExpiredReservations(now, this.batchSize, this.cursor ?? undefined);
          const result: SweepResult = { scanned: expired.length, expired: 0, skipped: 0, failed: 0 };

          if (expired.length === 0) {
               this.cursor = null;
               return result;
          }

          log.debug({ count: expired.length }, 'Expiring reservations');

          for (const reservation of expired) {
               try {
                    await this.reservations.expire(reservation);
                    result.expired++;
               } catch (error) {
                    // Released by its holder between the scan and the lock
                    if (error instanceof ReservationInactiveError) {
                         result.skipped++;
                         continue;
                    }
                    result.failed++;
                    log.error(
                         { err: error, reservationId: reservation.reservationId, sku: reservation.sku },
                         'Failed to expire reservation'
                    );
               }
          }

          // Reservations that keep failing stay ACTIVE; page past a full batch of them, then start over
          const last = expired[expired.length - 1];
          const paging = result.failed > 0 || this.cursor !== null;
          this.cursor =
               paging && expired.length === this.batchSize
                    ? { expiresAt: last.expiresAt, reservationId: last.reservationId }
                    : null;

          log.info({ ...result, resumeAfter: this.cursor?.reservationId }, 'Expiration sweep finished');
          return result;
     }

     start(): void {
          if (this.running) {
               return;
          }
          this.running = true;
          log.info({ intervalMs: this.intervalMs, batchSize: this.batchSize }, 'Starting expiration sweeper');
          this.schedule(0);
     }

     /** Stops scheduling and waits for a pass already under way. */
     async stop(): Promise<void> {
          this.running = false;
          if (this.timer) {
               clearTimeout(this.timer);
               this.timer = null;
          }
          if (this.inFlight) {
               await this.inFlight;
          }
          log.info('Expiration sweeper stopped');
     }

     get isRunning(): boolean {
          return this.running;
     }

     // The next pass is scheduled only after the previous one settles, so passes never overlap.
     private schedule(delayMs: number): void {
          this.timer = setTimeout(() => {
               this.timer = null;
               this.inFlight = this.sweepOnce()
                    .then(
                         () => undefined,
                         (error: unknown) => {
                              log.error({ err: error }, 'Expiration sweep failed');
                         }
                    )
                    .finally(() => {
                         this.inFlight = null;
                         if (this.running) {
                              this.schedule(this.intervalMs);
                         }
                    });
          }, delayMs);
     }
}
