import { errorResponses, idParam, lotSchema, pageQuerystring } from './common.schemas';

const lotParams = {
     type: 'object',
     required: ['lotId'],
     properties: { lotId: idParam },
} as const;

export const listLotsSchema = {
     tags: ['lots'],
     summary: 'List lots in creation order',
     querystring: pageQuerystring,
     response: {
          200: { type: 'array', items: lotSchema },
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getLotSchema = {
     tags: ['lots'],
     summary: 'Get a lot',
     params: lotParams,
     response: {
          200: lotSchema,
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getLotAllocationsSchema = {
     tags: ['lots'],
     summary: 'Withdrawals drawn from a lot',
     params: lotParams,
     response: {
          200: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         id: { type: 'integer' },
                         inventoryRecordId: { type: 'integer' },
                         lotId: { type: 'integer' },
                         quantity: { type: 'number' },
                         createdAt: { type: 'string', format: 'date-time' },
                    },
               },
          },
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};
