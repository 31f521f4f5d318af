import { PoolClient } from 'pg';
import {
     AppendJournalEntryRequest,
     JournalEntry,
     LotAllocation,
     LotAllocationRecord,
} from '../types/ledger.types';
import { ItemNotFoundError } from '../utils/errors';
import { formatQuantity, parseQuantity } from '../utils/quantity';
import { Result, err, ok } from '../utils/result';
import { ItemCatalog } from './item-catalog';

interface JournalRow {
     id: string;
     item_id: string;
     lot_id: string | null;
     quantity: string;
     updated_by: string;
     timestamp: Date;
}

interface AllocationRow {
     id: string;
     inventory_record_id: string;
     lot_id: string;
     quantity: string;
     created_at: Date;
}

function toJournalEntry(row: JournalRow): JournalEntry {
     return {
          id: Number(row.id),
          itemId: Number(row.item_id),
          lotId: row.lot_id === null ? null : Number(row.lot_id),
          quantity: parseQuantity(row.quantity),
          updatedBy: row.updated_by,
          timestamp: row.timestamp,
     };
}

function toAllocationRecord(row: AllocationRow): LotAllocationRecord {
     return {
          id: Number(row.id),
          inventoryRecordId: Number(row.inventory_record_id),
          lotId: Number(row.lot_id),
          quantity: parseQuantity(row.quantity),
          createdAt: row.created_at,
     };
}

/**
 * Append-only record of signed stock movements. Stock on hand is always
 * summed from the entries, never cached.
 */
export class InventoryJournal {
     constructor(private readonly catalog: ItemCatalog = new ItemCatalog()) {}

     async append(client: PoolClient, request: AppendJournalEntryRequest): Promise<JournalEntry> {
          const { rows } = await client.query<JournalRow>(
               `
      INSERT INTO inventory_record (item_id, lot_id, quantity, updated_by)
      VALUES ($1, $2, $3, $4)
      RETURNING id, item_id, lot_id, quantity, updated_by, timestamp
    `,
               [request.itemId, request.lotId ?? null, formatQuantity(request.quantity), request.actor]
          );
          return toJournalEntry(rows[0]);
     }

     /**
      * Per-lot audit rows for a withdrawal; their quantities sum to the
      * magnitude of the entry they belong to.
      */
     async recordAllocations(
          client: PoolClient,
          entryId: number,
          allocations: LotAllocation[]
     ): Promise<void> {
          for (const allocation of allocations) {
               await client.query(
                    `
        INSERT INTO lot_allocation (inventory_record_id, lot_id, quantity)
        VALUES ($1, $2, $3)
      `,
                    [entryId, allocation.lotId, formatQuantity(allocation.quantity)]
               );
          }
     }

     async history(
          client: PoolClient,
          itemId: number
     ): Promise<Result<JournalEntry[], ItemNotFoundError>> {
          if (!(await this.catalog.itemExists(client, itemId))) {
               return err(new ItemNotFoundError(itemId));
          }

          const { rows } = await client.query<JournalRow>(
               `
      SELECT id, item_id, lot_id, quantity, updated_by, timestamp
      FROM inventory_record
      WHERE item_id = $1
      ORDER BY timestamp DESC, id DESC
    `,
               [itemId]
          );
          return ok(rows.map(toJournalEntry));
     }

     async currentQuantity(
          client: PoolClient,
          itemId: number
     ): Promise<Result<number, ItemNotFoundError>> {
          if (!(await this.catalog.itemExists(client, itemId))) {
               return err(new ItemNotFoundError(itemId));
          }

          const { rows } = await client.query<{ total: string }>(
               `
      SELECT COALESCE(SUM(quantity), 0) AS total
      FROM inventory_record
      WHERE item_id = $1
    `,
               [itemId]
          );
          return ok(parseQuantity(rows[0].total));
     }

     async allocationsForLot(client: PoolClient, lotId: number): Promise<LotAllocationRecord[]> {
          const { rows } = await client.query<AllocationRow>(
               `
      SELECT id, inventory_record_id, lot_id, quantity, created_at
      FROM lot_allocation
      WHERE lot_id = $1
      ORDER BY id
    `,
               [lotId]
          );
          return rows.map(toAllocationRecord);
     }
}
