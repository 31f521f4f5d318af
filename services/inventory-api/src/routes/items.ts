import { FastifyInstance } from 'fastify';
import { withConnection, withLedgerTransaction } from '@lotledger/shared/src/db/client';
import { ItemCatalog } from '@lotledger/shared/src/services/item-catalog';
import { LotLedger } from '@lotledger/shared/src/services/lot-ledger';
import {
     createItemSchema,
     getItemLotsSchema,
     getItemSchema,
     listItemsSchema,
} from '../schemas/items.schemas';
import { sendDomainError, sendUnexpectedError } from './replies';

const catalog = new ItemCatalog();
const lotLedger = new LotLedger(catalog);

interface ItemParams {
     itemId: number;
}

export async function registerItemRoutes(app: FastifyInstance) {
     app.post<{ Body: { name: string; description?: string } }>(
          '/',
          { schema: createItemSchema },
          async (request, reply) => {
               try {
                    const result = await withLedgerTransaction((client) =>
                         catalog.createItem(client, request.body)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.code(201).send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to create item');
               }
          }
     );

     app.get<{ Querystring: { skip?: number; limit?: number } }>(
          '/',
          { schema: listItemsSchema },
          async (request, reply) => {
               try {
                    const items = await withConnection((client) =>
                         catalog.listItems(client, request.query)
                    );
                    return reply.send(items);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to list items');
               }
          }
     );

     app.get<{ Params: ItemParams }>(
          '/:itemId',
          { schema: getItemSchema },
          async (request, reply) => {
               try {
                    const result = await withConnection((client) =>
                         catalog.getItem(client, request.params.itemId)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to get item');
               }
          }
     );

     // Lots in FIFO order
     app.get<{ Params: ItemParams; Querystring: { excludeEmpty?: boolean } }>(
          '/:itemId/lots',
          { schema: getItemLotsSchema },
          async (request, reply) => {
               const excludeEmpty = request.query.excludeEmpty ?? true;

               try {
                    const result = await withConnection((client) =>
                         lotLedger.listAvailableLots(client, request.params.itemId, excludeEmpty)
                    );

                    if (!result.ok) {
                         return sendDomainError(reply, result.error);
                    }

                    return reply.send(result.value);
               } catch (error) {
                    return sendUnexpectedError(request, reply, error, 'Failed to list item lots');
               }
          }
     );
}
