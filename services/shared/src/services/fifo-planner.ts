import Decimal from 'decimal.js';
import { LotAllocation } from '../types/ledger.types';
import { sumQuantities } from '../utils/quantity';
import { Result, err, ok } from '../utils/result';

export interface AllocatableLot {
     id: number;
     remainingQuantity: number;
}

export interface AllocationShortfall {
     requested: number;
     available: number;
     shortfall: number;
}

/**
 * Decide which lots absorb a withdrawal of `requested` units. Lots are
 * drained oldest id first; expiry and manufacturing dates play no part.
 * Nothing is mutated: the caller applies the returned plan.
 */
export function planFifoAllocation(
     lots: readonly AllocatableLot[],
     requested: number
): Result<LotAllocation[], AllocationShortfall> {
     const ordered = [...lots]
          .filter((lot) => lot.remainingQuantity > 0)
          .sort((a, b) => a.id - b.id);

     let need = new Decimal(requested);
     const allocations: LotAllocation[] = [];

     for (const lot of ordered) {
          if (need.lte(0)) {
               break;
          }
          const take = Decimal.min(lot.remainingQuantity, need);
          allocations.push({ lotId: lot.id, quantity: take.toNumber() });
          need = need.minus(take);
     }

     if (need.gt(0)) {
          const available = sumQuantities(ordered.map((lot) => lot.remainingQuantity));
          return err({
               requested,
               available: available.toNumber(),
               shortfall: need.toNumber(),
          });
     }

     return ok(allocations);
}
