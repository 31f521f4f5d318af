import { PoolClient } from 'pg';
import {
     DomainEventType,
     InventoryRecordedEvent,
     LotDepletedEvent,
     PurchaseReceivedEvent,
} from '../types/ledger.types';

interface DomainEventPayloads {
     InventoryRecorded: InventoryRecordedEvent;
     LotDepleted: LotDepletedEvent;
     PurchaseReceived: PurchaseReceivedEvent;
}

/**
 * Stage a domain event in the outbox table. The row commits or rolls back
 * together with the state change that produced it.
 */
export async function enqueueDomainEvent<K extends DomainEventType>(
     client: PoolClient,
     type: K,
     payload: DomainEventPayloads[K]
): Promise<void> {
     await client.query(
          `
      INSERT INTO domain_event (type, payload)
      VALUES ($1, $2::jsonb)
    `,
          [type, JSON.stringify(payload)]
     );
}
