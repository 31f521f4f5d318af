import { errorResponses, idParam, pageQuerystring, purchaseSchema } from './common.schemas';

const isoDate = { type: 'string', format: 'date', example: '2027-06-30' } as const;

export const createPurchaseSchema = {
     tags: ['purchases'],
     summary: 'Record a purchase',
     description:
          'Imported purchases, and any purchase given a lotNumber, create a lot holding the purchased quantity. Stock is not journaled by a purchase.',
     body: {
          type: 'object',
          required: ['itemId', 'quantity', 'type', 'supplier', 'unitPrice', 'createdBy'],
          properties: {
               itemId: idParam,
               quantity: { type: 'number', exclusiveMinimum: 0, example: 40 },
               type: { type: 'string', enum: ['domestic', 'imported'] },
               supplier: { type: 'string', minLength: 1, example: 'Harbor Imports' },
               unitPrice: { type: 'number', minimum: 0, example: 12.5 },
               createdBy: { type: 'string', minLength: 1, example: 'buyer-2' },
               lotNumber: { type: 'string', minLength: 1, maxLength: 100 },
               manufacturingDate: isoDate,
               expiryDate: isoDate,
          },
     },
     response: {
          201: { description: 'Purchase recorded', ...purchaseSchema },
          ...errorResponses,
     },
};

export const listPurchasesSchema = {
     tags: ['purchases'],
     summary: 'List purchases, newest first',
     querystring: pageQuerystring,
     response: {
          200: { type: 'array', items: purchaseSchema },
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getPurchaseSchema = {
     tags: ['purchases'],
     summary: 'Get a purchase with its lot',
     params: {
          type: 'object',
          required: ['purchaseId'],
          properties: { purchaseId: idParam },
     },
     response: {
          200: purchaseSchema,
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};
