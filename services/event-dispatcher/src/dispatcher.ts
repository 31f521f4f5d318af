import type { PoolClient } from 'pg';
import { withTransaction } from '@lotledger/shared/src/db/client';
import { getChannel, INVENTORY_EVENTS_EXCHANGE } from '@lotledger/shared/src/messaging/client';
import { createChildLogger } from '@lotledger/shared/src/utils/logger';

const logger = createChildLogger({ component: 'event-dispatcher' });

interface PendingEventRow {
     id: string;
     type: string;
     payload: Record<string, unknown>;
     created_at: Date;
}

export interface EventDispatcherOptions {
     batchSize: number;
     pollIntervalMs: number;
}

export class EventDispatcher {
     private running = false;

     constructor(private readonly options: EventDispatcherOptions) {}

     async start() {
          this.running = true;
          logger.info(
               { batchSize: this.options.batchSize, pollIntervalMs: this.options.pollIntervalMs },
               'Starting event dispatcher'
          );

          while (this.running) {
               try {
                    await this.processBatch();
               } catch (error) {
                    logger.error({ error }, 'Error processing event batch');
               }

               await this.sleep(this.options.pollIntervalMs);
          }
     }

     /**
      * Publish one batch of pending outbox rows. Returns the number handled.
      */
     async processBatch(): Promise<number> {
          return withTransaction(async (client) => {
               // Row locks let several dispatchers share the outbox
               const { rows: events } = await client.query<PendingEventRow>(
                    `
        SELECT id, type, payload, created_at
        FROM domain_event
        WHERE status = 'PENDING'
        ORDER BY created_at, id
        LIMIT $1
        FOR UPDATE SKIP LOCKED
      `,
                    [this.options.batchSize]
               );

               if (events.length === 0) {
                    return 0;
               }

               logger.debug({ eventCount: events.length }, 'Processing event batch');

               const channel = await getChannel();

               for (const event of events) {
                    await this.dispatch(client, event, (content) =>
                         channel.publish(
                              INVENTORY_EVENTS_EXCHANGE,
                              `inventory.${event.type}`,
                              content,
                              {
                                   persistent: true,
                                   contentType: 'application/json',
                                   timestamp: Date.now(),
                                   messageId: String(event.id),
                                   type: event.type,
                              }
                         )
                    );
               }

               logger.info({ dispatched: events.length }, 'Event batch processed');
               return events.length;
          });
     }

     private async dispatch(
          client: PoolClient,
          event: PendingEventRow,
          publish: (content: Buffer) => boolean
     ): Promise<void> {
          try {
               const accepted = publish(Buffer.from(JSON.stringify(event.payload)));
               if (!accepted) {
                    throw new Error('Channel write buffer is full');
               }

               await client.query(
                    `
          UPDATE domain_event
          SET status = 'SENT', updated_at = NOW()
          WHERE id = $1
        `,
                    [event.id]
               );

               logger.debug({ eventId: event.id, type: event.type }, 'Event dispatched');
          } catch (error) {
               logger.error({ error, eventId: event.id }, 'Failed to dispatch event');

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
          }
     }

     stop() {
          logger.info('Stopping event dispatcher');
          this.running = false;
     }

     private sleep(ms: number): Promise<void> {
          return new Promise((resolve) => setTimeout(resolve, ms));
     }
}
