import type { PoolClient } from 'pg';
import { StockEventType } from '@stockledger/shared/src/types/inventory.types';
import { DispatcherConfig } from '@stockledger/shared/src/utils/config';
import { createChildLogger } from '@stockledger/shared/src/utils/logger';

const log = createChildLogger({ component: 'event-dispatcher' });

export interface OutboxEventRow {
     id: string;
     type: StockEventType;
     payload: Record<string, unknown>;
     retry_count: number;
     created_at: Date;
}

export type RunInTransaction = <T>(fn: (client: PoolClient) => Promise<T>) => Promise<T>;

export type PublishFn = (
     type: StockEventType,
     payload: Record<string, unknown>,
     options: { messageId: string }
) => Promise<boolean>;

export interface BatchResult {
     sent: number;
     failed: number;
}

/**
 * Relays rows of the domain_event outbox to the broker. Rows are claimed with
 * SKIP LOCKED so several dispatchers can drain the same table.
 */
export class EventDispatcher {
     private running = false;

     constructor(
          private readonly runInTransaction: RunInTransaction,
          private readonly publish: PublishFn,
          private readonly config: DispatcherConfig
     ) {}

     async start(): Promise<void> {
          this.running = true;
          log.info(
               {
                    batchSize: this.config.batchSize,
                    pollIntervalMs: this.config.pollIntervalMs,
                    maxRetries: this.config.maxRetries,
               },
               'Starting event dispatcher'
          );

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    log.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.config.pollIntervalMs);
          }
     }

     async processBatch(): Promise<BatchResult> {
          return this.runInTransaction(async (client) => {
               // Pending rows, plus failed rows that still have retries left
               const { rows: events } = await client.query<OutboxEventRow>(
                    `
        SELECT id, type, payload, retry_count, created_at
        FROM domain_event
        WHERE status = 'PENDING'
           OR (status = 'FAILED' AND retry_count < $2)
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.config.batchSize, this.config.maxRetries]
               );

               const result: BatchResult = { sent: 0, failed: 0 };
               if (events.length === 0) {
                    return result;
               }

               log.debug({ eventCount: events.length }, 'Processing event batch');

               for (const event of events) {
                    try {
                         await this.publish(event.type, event.payload, { messageId: String(event.id) });

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'SENT', updated_at = NOW(), error = NULL
            WHERE id = $1
          `,
                              [event.id]
                         );

                         result.sent++;
                         log.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
                    } catch (error) {
                         log.error({ error, eventId: event.id, type: event.type }, 'Failed to dispatch event');

                         await client.query(
                              `
            UPDATE domain_event
            SET status = 'FAILED',
                updated_at = NOW(),
                retry_count = retry_count + 1,
                error = $2
            WHERE id = $1
          `,
                              [event.id, error instanceof Error ? error.message : 'Unknown error']
                         );
                         result.failed++;
                    }
               }

               log.info(result, 'Event batch processed');
               return result;
          });
     }

     stop(): void {
          log.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
