import { PoolClient } from 'pg';
import { CreateLotRequest, Lot, Page } from '../types/ledger.types';
import {
     DuplicateLotNumberError,
     InsufficientLotQuantityError,
     ItemNotFoundError,
     LotNotFoundError,
} from '../utils/errors';
import { isUniqueViolation } from '../utils/pg-errors';
import { formatQuantity, parseQuantity } from '../utils/quantity';
import { Result, err, ok } from '../utils/result';
import { logger } from '../utils/logger';
import { ItemCatalog } from './item-catalog';

interface LotRow {
     id: string;
     purchase_id: string;
     item_id: string;
     lot_number: string;
     manufacturing_date: string | null;
     expiry_date: string | null;
     initial_quantity: string;
     remaining_quantity: string;
     created_at: Date;
}

const LOT_COLUMNS = `
        l.id,
        l.purchase_id,
        p.item_id,
        l.lot_number,
        to_char(l.manufacturing_date, 'YYYY-MM-DD') AS manufacturing_date,
        to_char(l.expiry_date, 'YYYY-MM-DD') AS expiry_date,
        l.initial_quantity,
        l.remaining_quantity,
        l.created_at`;

function toLot(row: LotRow): Lot {
     return {
          id: Number(row.id),
          purchaseId: Number(row.purchase_id),
          itemId: Number(row.item_id),
          lotNumber: row.lot_number,
          manufacturingDate: row.manufacturing_date ?? undefined,
          expiryDate: row.expiry_date ?? undefined,
          initialQuantity: parseQuantity(row.initial_quantity),
          remainingQuantity: parseQuantity(row.remaining_quantity),
          createdAt: row.created_at,
     };
}

export function defaultLotNumber(purchaseId: number): string {
     return `LOT-${purchaseId}`;
}

export interface GetLotOptions {
     /** Take a row lock held until the surrounding transaction ends */
     forUpdate?: boolean;
}

/**
 * Owns the lots of each item. Lot id is the FIFO key: lots are always
 * enumerated and locked in ascending id (creation) order.
 */
export class LotLedger {
     constructor(private readonly catalog: ItemCatalog = new ItemCatalog()) {}

     async createLot(
          client: PoolClient,
          request: CreateLotRequest
     ): Promise<Result<Lot, DuplicateLotNumberError>> {
          const lotNumber = request.lotNumber ?? defaultLotNumber(request.purchaseId);

          const { rows: existing } = await client.query<{ id: string }>(
               `SELECT id FROM lot WHERE lot_number = $1`,
               [lotNumber]
          );
          if (existing.length > 0) {
               return err(new DuplicateLotNumberError(lotNumber));
          }

          try {
               const { rows } = await client.query<LotRow>(
                    `
        WITH l AS (
          INSERT INTO lot (
            purchase_id,
            lot_number,
            manufacturing_date,
            expiry_date,
            initial_quantity,
            remaining_quantity
          ) VALUES ($1, $2, $3, $4, $5, $5)
          RETURNING *
        )
        SELECT ${LOT_COLUMNS}
        FROM l
        JOIN purchase p ON p.id = l.purchase_id
      `,
                    [
                         request.purchaseId,
                         lotNumber,
                         request.manufacturingDate ?? null,
                         request.expiryDate ?? null,
                         formatQuantity(request.initialQuantity),
                    ]
               );

               const lot = toLot(rows[0]);
               logger.info(
                    { lotId: lot.id, lotNumber, purchaseId: request.purchaseId },
                    'Lot created'
               );
               return ok(lot);
          } catch (error) {
               if (isUniqueViolation(error, 'lot_lot_number_key')) {
                    return err(new DuplicateLotNumberError(lotNumber));
               }
               throw error;
          }
     }

     async getLot(
          client: PoolClient,
          lotId: number,
          options: GetLotOptions = {}
     ): Promise<Result<Lot, LotNotFoundError>> {
          const { rows } = await client.query<LotRow>(
               `
      SELECT ${LOT_COLUMNS}
      FROM lot l
      JOIN purchase p ON p.id = l.purchase_id
      WHERE l.id = $1
      ${options.forUpdate ? 'FOR UPDATE OF l' : ''}
    `,
               [lotId]
          );
          if (rows.length === 0) {
               return err(new LotNotFoundError(lotId));
          }
          return ok(toLot(rows[0]));
     }

     /**
      * Look up a lot that must have been received for the given item.
      */
     async getLotForItem(
          client: PoolClient,
          lotId: number,
          itemId: number,
          options: GetLotOptions = {}
     ): Promise<Result<Lot, LotNotFoundError>> {
          const result = await this.getLot(client, lotId, options);
          if (result.ok && result.value.itemId !== itemId) {
               return err(new LotNotFoundError(lotId));
          }
          return result;
     }

     /**
      * Lots of an item in FIFO order.
      */
     async listAvailableLots(
          client: PoolClient,
          itemId: number,
          excludeEmpty: boolean = true
     ): Promise<Result<Lot[], ItemNotFoundError>> {
          if (!(await this.catalog.itemExists(client, itemId))) {
               return err(new ItemNotFoundError(itemId));
          }

          const { rows } = await client.query<LotRow>(
               `
      SELECT ${LOT_COLUMNS}
      FROM lot l
      JOIN purchase p ON p.id = l.purchase_id
      WHERE p.item_id = $1
      ${excludeEmpty ? 'AND l.remaining_quantity > 0' : ''}
      ORDER BY l.id
    `,
               [itemId]
          );
          return ok(rows.map(toLot));
     }

     /**
      * Lock every non-empty lot of an item, oldest first. Callers must be
      * inside a transaction; the locks serialize competing withdrawals.
      */
     async lockAvailableLots(client: PoolClient, itemId: number): Promise<Lot[]> {
          const { rows } = await client.query<LotRow>(
               `
      SELECT ${LOT_COLUMNS}
      FROM lot l
      JOIN purchase p ON p.id = l.purchase_id
      WHERE p.item_id = $1
        AND l.remaining_quantity > 0
      ORDER BY l.id
      FOR UPDATE OF l
    `,
               [itemId]
          );
          return rows.map(toLot);
     }

     /**
      * Subtract from a lot's remaining quantity. The only statement in the
      * system that mutates a lot.
      */
     async decrement(
          client: PoolClient,
          lotId: number,
          amount: number
     ): Promise<Result<Lot, LotNotFoundError | InsufficientLotQuantityError>> {
          if (amount < 0) {
               throw new RangeError(`Lot decrement must not be negative, got ${amount}`);
          }

          const { rows } = await client.query<LotRow>(
               `
      UPDATE lot l
      SET remaining_quantity = l.remaining_quantity - $1,
          updated_at = NOW()
      FROM purchase p
      WHERE l.id = $2
        AND p.id = l.purchase_id
        AND l.remaining_quantity >= $1
      RETURNING ${LOT_COLUMNS}
    `,
               [formatQuantity(amount), lotId]
          );

          if (rows.length === 0) {
               const current = await this.getLot(client, lotId);
               if (!current.ok) {
                    return current;
               }
               return err(
                    new InsufficientLotQuantityError(
                         lotId,
                         amount,
                         current.value.remainingQuantity
                    )
               );
          }

          const lot = toLot(rows[0]);
          logger.debug(
               { lotId, amount, remainingQuantity: lot.remainingQuantity },
               'Lot decremented'
          );
          return ok(lot);
     }

     async listLots(
          client: PoolClient,
          { skip = 0, limit = 100, itemId }: Page & { itemId?: number } = {}
     ): Promise<Lot[]> {
          const { rows } = await client.query<LotRow>(
               `
      SELECT ${LOT_COLUMNS}
      FROM lot l
      JOIN purchase p ON p.id = l.purchase_id
      WHERE ($1::bigint IS NULL OR p.item_id = $1)
      ORDER BY l.id
      OFFSET $2
      LIMIT $3
    `,
               [itemId ?? null, skip, limit]
          );
          return rows.map(toLot);
     }

     async listLotsForPurchases(client: PoolClient, purchaseIds: number[]): Promise<Lot[]> {
          const { rows } = await client.query<LotRow>(
               `
      SELECT ${LOT_COLUMNS}
      FROM lot l
      JOIN purchase p ON p.id = l.purchase_id
      WHERE l.purchase_id = ANY($1::bigint[])
      ORDER BY l.id
    `,
               [purchaseIds]
          );
          return rows.map(toLot);
     }
}
