import { PoolClient } from 'pg';
import {
     InventoryChangeRequest,
     Lot,
     LotAllocation,
     RecordedInventoryChange,
} from '../types/ledger.types';
import {
     InsufficientAggregateQuantityError,
     InsufficientLotQuantityError,
     InvalidQuantityError,
     ItemNotFoundError,
     LotNotFoundError,
} from '../utils/errors';
import { enqueueDomainEvent } from '../messaging/outbox';
import { validateQuantity } from '../utils/quantity';
import { Result, err, ok } from '../utils/result';
import { logger } from '../utils/logger';
import { ItemCatalog } from './item-catalog';
import { LotLedger } from './lot-ledger';
import { InventoryJournal } from './inventory-journal';
import { planFifoAllocation } from './fifo-planner';

/**
 * What an increase that names a lot does to that lot:
 * - `record-only`: the journal entry carries the lot reference, the lot is untouched
 * - `consume`: the absolute quantity is deducted from the lot, as for a withdrawal
 */
export type ExplicitLotIncreasePolicy = 'record-only' | 'consume';

export function parseExplicitLotIncreasePolicy(value: string | undefined): ExplicitLotIncreasePolicy {
     return value === 'consume' ? 'consume' : 'record-only';
}

export interface AllocationEngineOptions {
     catalog?: ItemCatalog;
     lotLedger?: LotLedger;
     journal?: InventoryJournal;
     explicitLotIncrease?: ExplicitLotIncreasePolicy;
}

export type InventoryChangeError =
     | InvalidQuantityError
     | ItemNotFoundError
     | LotNotFoundError
     | InsufficientLotQuantityError
     | InsufficientAggregateQuantityError;

type LotConsumption = Result<LotAllocation[], InventoryChangeError>;

/**
 * Applies a signed stock change to an item. Withdrawals without a lot are
 * spread over the item's lots in FIFO order under row locks, and exactly
 * one journal entry is written per change.
 */
export class AllocationEngine {
     private readonly catalog: ItemCatalog;
     private readonly lots: LotLedger;
     private readonly journal: InventoryJournal;
     private readonly explicitLotIncrease: ExplicitLotIncreasePolicy;

     constructor(options: AllocationEngineOptions = {}) {
          this.catalog = options.catalog ?? new ItemCatalog();
          this.lots = options.lotLedger ?? new LotLedger(this.catalog);
          this.journal = options.journal ?? new InventoryJournal(this.catalog);
          this.explicitLotIncrease = options.explicitLotIncrease ?? 'record-only';
     }

     async record(
          client: PoolClient,
          request: InventoryChangeRequest
     ): Promise<Result<RecordedInventoryChange, InventoryChangeError>> {
          const { itemId, quantity, lotId, actor } = request;

          const invalid = validateQuantity(quantity);
          if (invalid !== null) {
               return err(new InvalidQuantityError(invalid));
          }

          if (!(await this.catalog.itemExists(client, itemId))) {
               return err(new ItemNotFoundError(itemId));
          }

          let consumption: LotConsumption;
          if (lotId !== undefined) {
               consumption = await this.consumeNamedLot(client, itemId, lotId, quantity);
          } else if (quantity >= 0) {
               consumption = ok([]);
          } else {
               consumption = await this.consumeFifo(client, itemId, Math.abs(quantity));
          }

          if (!consumption.ok) {
               logger.warn(
                    { itemId, lotId, quantity, code: consumption.error.code },
                    'Inventory change rejected'
               );
               return consumption;
          }

          const allocations = consumption.value;
          // A multi-lot withdrawal is journaled once, against the first lot drained
          const entryLotId = lotId ?? allocations[0]?.lotId ?? null;

          const entry = await this.journal.append(client, {
               itemId,
               quantity,
               lotId: entryLotId,
               actor,
          });
          if (allocations.length > 0) {
               await this.journal.recordAllocations(client, entry.id, allocations);
          }

          await enqueueDomainEvent(client, 'InventoryRecorded', {
               entryId: entry.id,
               itemId,
               lotId: entry.lotId,
               quantity,
               actor,
               allocations,
               timestamp: new Date().toISOString(),
          });

          logger.info(
               { itemId, entryId: entry.id, quantity, lotId: entry.lotId, lotsTouched: allocations.length },
               'Inventory change recorded'
          );

          return ok({ entry, allocations });
     }

     private async consumeNamedLot(
          client: PoolClient,
          itemId: number,
          lotId: number,
          quantity: number
     ): Promise<LotConsumption> {
          const lot = await this.lots.getLotForItem(client, lotId, itemId, { forUpdate: true });
          if (!lot.ok) {
               return lot;
          }

          if (quantity >= 0 && this.explicitLotIncrease === 'record-only') {
               return ok([]);
          }

          const amount = Math.abs(quantity);
          if (amount === 0) {
               return ok([]);
          }

          const decremented = await this.lots.decrement(client, lotId, amount);
          if (!decremented.ok) {
               return decremented;
          }
          await this.announceIfDepleted(client, decremented.value);

          return ok([{ lotId, quantity: amount }]);
     }

     private async consumeFifo(
          client: PoolClient,
          itemId: number,
          requested: number
     ): Promise<LotConsumption> {
          // Locks are held until the transaction ends, so the plan below
          // cannot be invalidated by a concurrent withdrawal.
          const available = await this.lots.lockAvailableLots(client, itemId);

          const plan = planFifoAllocation(available, requested);
          if (!plan.ok) {
               const { available: total, shortfall } = plan.error;
               return err(
                    new InsufficientAggregateQuantityError(itemId, requested, total, shortfall)
               );
          }

          for (const allocation of plan.value) {
               const decremented = await this.lots.decrement(
                    client,
                    allocation.lotId,
                    allocation.quantity
               );
               if (!decremented.ok) {
                    return decremented;
               }
               logger.debug(
                    { itemId, lotId: allocation.lotId, take: allocation.quantity },
                    'Lot allocated'
               );
               await this.announceIfDepleted(client, decremented.value);
          }

          return ok(plan.value);
     }

     private async announceIfDepleted(client: PoolClient, lot: Lot): Promise<void> {
          if (lot.remainingQuantity > 0) {
               return;
          }
          await enqueueDomainEvent(client, 'LotDepleted', {
               lotId: lot.id,
               lotNumber: lot.lotNumber,
               itemId: lot.itemId,
               timestamp: new Date().toISOString(),
          });
     }
}
