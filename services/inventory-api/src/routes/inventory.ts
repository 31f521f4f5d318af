import { FastifyInstance } from 'fastify';
import { withConnection, withLedgerTransaction } from '@lotledger/shared/src/db/client';
import {
     AllocationEngine,
     parseExplicitLotIncreasePolicy,
} from '@lotledger/shared/src/services/allocation-engine';
import { InventoryJournal } from '@lotledger/shared/src/services/inventory-journal';
import {
     createInventoryRecordSchema,
     getCurrentQuantitySchema,
     getItemHistorySchema,
} from '../schemas/inventory.schemas';
import { sendDomainError, sendUnexpectedError } from './replies';

const allocationEngine = new AllocationEngine({
     explicitLotIncrease: parseExplicitLotIncreasePolicy(process.env.EXPLICIT_LOT_INCREASE_POLICY),
});
const journal = new InventoryJournal();

interface CreateInventoryRecordBody {
     itemId: number;
     quantity: number;
     updatedBy: string;
     lotId?: number;
}

interface ItemParams {
     itemId: number;
}

export async function registerInventoryRoutes(app: FastifyInstance) {
     // Record a stock change, allocating withdrawals across lots
     app.post<{ Body: CreateInventoryRecordBody }>(
          '/',
          { schema: createInventoryRecordSchema },
          async (request, reply) => {
               const { itemId, quantity, updatedBy, lotId } = request.body;

               try {
                    const result = await withLedgerTransaction((client) =>
                         allocationEngine.record(client, {
                              itemId,
                              quantity,
                              lotId,
                              actor: updatedBy,
                         })
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.code(201).send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to record inventory change');
               }
          }
     );

     // Journal history for an item
     app.get<{ Params: ItemParams }>(
          '/:itemId',
          { schema: getItemHistorySchema },
          async (request, reply) => {
               try {
                    const result = await withConnection((client) =>
                         journal.history(client, request.params.itemId)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get inventory history');
               }
          }
     );

     // Stock on hand
     app.get<{ Params: ItemParams }>(
          '/:itemId/quantity',
          { schema: getCurrentQuantitySchema },
          async (request, reply) => {
               const { itemId } = request.params;

               try {
                    const result = await withConnection((client) =>
                         journal.currentQuantity(client, itemId)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send({ itemId, quantity: result.value });
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get current quantity');
               }
          }
     );
}
