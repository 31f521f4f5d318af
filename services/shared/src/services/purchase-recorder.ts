import { PoolClient } from 'pg';
import { CreatePurchaseRequest, Lot, Page, Purchase, PurchaseType } from '../types/ledger.types';
import {
     DuplicateLotNumberError,
     InvalidLotDatesError,
     InvalidQuantityError,
     ItemNotFoundError,
     PurchaseNotFoundError,
} from '../utils/errors';
import { enqueueDomainEvent } from '../messaging/outbox';
import { formatQuantity, parseQuantity, validateQuantity } from '../utils/quantity';
import { Result, err, ok } from '../utils/result';
import { logger } from '../utils/logger';
import { ItemCatalog } from './item-catalog';
import { LotLedger } from './lot-ledger';

interface PurchaseRow {
     id: string;
     item_id: string;
     quantity: string;
     type: PurchaseType;
     supplier: string;
     unit_price: string;
     created_by: string;
     purchase_date: Date;
}

function toPurchase(row: PurchaseRow, lot?: Lot): Purchase {
     return {
          id: Number(row.id),
          itemId: Number(row.item_id),
          quantity: parseQuantity(row.quantity),
          type: row.type,
          supplier: row.supplier,
          unitPrice: parseQuantity(row.unit_price),
          createdBy: row.created_by,
          purchaseDate: row.purchase_date,
          lot,
     };
}

export type CreatePurchaseError =
     | InvalidQuantityError
     | InvalidLotDatesError
     | ItemNotFoundError
     | DuplicateLotNumberError;

// Imported goods are always lot-tracked; domestic ones only when a lot number is given
export function requiresLot(request: Pick<CreatePurchaseRequest, 'type' | 'lotNumber'>): boolean {
     return request.type === 'imported' || request.lotNumber !== undefined;
}

/**
 * Records receipts. A purchase that needs a lot gets it in the same
 * transaction; receiving stock does not journal it.
 */
export class PurchaseRecorder {
     private readonly catalog: ItemCatalog;
     private readonly lots: LotLedger;

     constructor(catalog: ItemCatalog = new ItemCatalog(), lots?: LotLedger) {
          this.catalog = catalog;
          this.lots = lots ?? new LotLedger(catalog);
     }

     async createPurchase(
          client: PoolClient,
          request: CreatePurchaseRequest
     ): Promise<Result<Purchase, CreatePurchaseError>> {
          const invalid = validateQuantity(request.quantity) ?? validateQuantity(request.unitPrice);
          if (invalid !== null) {
               return err(new InvalidQuantityError(invalid));
          }
          if (request.quantity <= 0) {
               return err(new InvalidQuantityError('Purchase quantity must be positive'));
          }
          // YYYY-MM-DD strings order the same way as the dates they name
          const { manufacturingDate, expiryDate } = request;
          if (
               manufacturingDate !== undefined &&
               expiryDate !== undefined &&
               expiryDate < manufacturingDate
          ) {
               return err(new InvalidLotDatesError(manufacturingDate, expiryDate));
          }

          if (!(await this.catalog.itemExists(client, request.itemId))) {
               return err(new ItemNotFoundError(request.itemId));
          }

          const { rows } = await client.query<PurchaseRow>(
               `
      INSERT INTO purchase (
        item_id,
        quantity,
        type,
        supplier,
        unit_price,
        created_by
      ) VALUES ($1, $2, $3, $4, $5, $6)
      RETURNING id, item_id, quantity, type, supplier, unit_price, created_by, purchase_date
    `,
               [
                    request.itemId,
                    formatQuantity(request.quantity),
                    request.type,
                    request.supplier,
                    formatQuantity(request.unitPrice),
                    request.createdBy,
               ]
          );
          const purchaseRow = rows[0];
          const purchaseId = Number(purchaseRow.id);

          let lot: Lot | undefined;
          if (requiresLot(request)) {
               const created = await this.lots.createLot(client, {
                    purchaseId,
                    lotNumber: request.lotNumber,
                    manufacturingDate: request.manufacturingDate,
                    expiryDate: request.expiryDate,
                    initialQuantity: request.quantity,
               });
               if (!created.ok) {
                    return created;
               }
               lot = created.value;
          }

          await enqueueDomainEvent(client, 'PurchaseReceived', {
               purchaseId,
               itemId: request.itemId,
               quantity: request.quantity,
               type: request.type,
               lotId: lot?.id ?? null,
               timestamp: new Date().toISOString(),
          });

          logger.info(
               { purchaseId, itemId: request.itemId, type: request.type, lotId: lot?.id },
               'Purchase recorded'
          );

          return ok(toPurchase(purchaseRow, lot));
     }

     async getPurchase(
          client: PoolClient,
          purchaseId: number
     ): Promise<Result<Purchase, PurchaseNotFoundError>> {
          const { rows } = await client.query<PurchaseRow>(
               `
      SELECT id, item_id, quantity, type, supplier, unit_price, created_by, purchase_date
      FROM purchase
      WHERE id = $1
    `,
               [purchaseId]
          );
          if (rows.length === 0) {
               return err(new PurchaseNotFoundError(purchaseId));
          }
          const lots = await this.lotsByPurchase(client, [purchaseId]);
          return ok(toPurchase(rows[0], lots.get(purchaseId)));
     }

     async listPurchases(
          client: PoolClient,
          { skip = 0, limit = 100, itemId }: Page & { itemId?: number } = {}
     ): Promise<Purchase[]> {
          const { rows } = await client.query<PurchaseRow>(
               `
      SELECT id, item_id, quantity, type, supplier, unit_price, created_by, purchase_date
      FROM purchase
      WHERE ($1::bigint IS NULL OR item_id = $1)
      ORDER BY purchase_date DESC, id DESC
      OFFSET $2
      LIMIT $3
    `,
               [itemId ?? null, skip, limit]
          );
          const lots = await this.lotsByPurchase(
               client,
               rows.map((row) => Number(row.id))
          );
          return rows.map((row) => toPurchase(row, lots.get(Number(row.id))));
     }

     private async lotsByPurchase(
          client: PoolClient,
          purchaseIds: number[]
     ): Promise<Map<number, Lot>> {
          if (purchaseIds.length === 0) {
               return new Map();
          }
          const lots = await this.lots.listLotsForPurchases(client, purchaseIds);
          return new Map(lots.map((lot) => [lot.purchaseId, lot]));
     }
}
