import { FastifyInstance } from 'fastify';
import { withConnection, withLedgerTransaction } from '@lotledger/shared/src/db/client';
import { PurchaseRecorder } from '@lotledger/shared/src/services/purchase-recorder';
import type { CreatePurchaseRequest } from '@lotledger/shared/src/types/ledger.types';
import {
     createPurchaseSchema,
     getPurchaseSchema,
     listPurchasesSchema,
} from '../schemas/purchases.schemas';
import { sendDomainError, sendUnexpectedError } from './replies';

const recorder = new PurchaseRecorder();

export async function registerPurchaseRoutes(app: FastifyInstance) {
     // Receive goods, creating a lot where the purchase requires one
     app.post<{ Body: CreatePurchaseRequest }>(
          '/',
          { schema: createPurchaseSchema },
          async (request, reply) => {
               try {
                    const result = await withLedgerTransaction((client) =>
                         recorder.createPurchase(client, request.body)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.code(201).send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to record purchase');
               }
          }
     );

     app.get<{ Querystring: { skip?: number; limit?: number; itemId?: number } }>(
          '/',
          { schema: listPurchasesSchema },
          async (request, reply) => {
               try {
                    const purchases = await withConnection((client) =>
                         recorder.listPurchases(client, request.query)
                    );
                    return reply.send(purchases);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to list purchases');
               }
          }
     );

     app.get<{ Params: { purchaseId: number } }>(
          '/:purchaseId',
          { schema: getPurchaseSchema },
          async (request, reply) => {
               try {
                    const result = await withConnection((client) =>
                         recorder.getPurchase(client, request.params.purchaseId)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get purchase');
               }
          }
     );
}
