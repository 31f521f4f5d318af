import { FastifyInstance } from 'fastify';
import { withConnection } from '@lotledger/shared/src/db/client';
import { ok } from '@lotledger/shared/src/utils/result';
import { LotLedger } from '@lotledger/shared/src/services/lot-ledger';
import { InventoryJournal } from '@lotledger/shared/src/services/inventory-journal';
import { getLotAllocationsSchema, getLotSchema, listLotsSchema } from '../schemas/lots.schemas';
import { sendDomainError, sendUnexpectedError } from './replies';

const lotLedger = new LotLedger();
const journal = new InventoryJournal();

export async function registerLotRoutes(app: FastifyInstance) {
     app.get<{ Querystring: { skip?: number; limit?: number; itemId?: number } }>(
          '/',
          { schema: listLotsSchema },
          async (request, reply) => {
               try {
                    const lots = await withConnection((client) =>
                         lotLedger.listLots(client, request.query)
                    );
                    return reply.send(lots);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to list lots');
               }
          }
     );

     app.get<{ Params: { lotId: number } }>(
          '/:lotId',
          { schema: getLotSchema },
          async (request, reply) => {
               try {
                    const result = await withConnection((client) =>
                         lotLedger.getLot(client, request.params.lotId)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get lot');
               }
          }
     );

     // Audit trail of withdrawals drawn from a lot
     app.get<{ Params: { lotId: number } }>(
          '/:lotId/allocations',
          { schema: getLotAllocationsSchema },
          async (request, reply) => {
               const { lotId } = request.params;

               try {
                    const result = await withConnection(async (client) => {
                         const lot = await lotLedger.getLot(client, lotId);
                         if (!lot.ok) {
                              return lot;
                         }
                         return ok(await journal.allocationsForLot(client, lotId));
                    });

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get lot allocations');
               }
          }
     );
}
