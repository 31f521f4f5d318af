import { errorResponses, idParam, journalEntrySchema, lotAllocationSchema } from './common.schemas';

export const createInventoryRecordSchema = {
     tags: ['inventory'],
     summary: 'Record a signed stock change',
     description:
          'Positive quantities add stock. Negative quantities withdraw stock: from the named lot when lotId is given, otherwise from the oldest lots first. Either every lot deduction and the journal entry are stored, or nothing is.',
     body: {
          type: 'object',
          required: ['itemId', 'quantity', 'updatedBy'],
          properties: {
               itemId: { ...idParam, example: 1 },
               quantity: { type: 'number', example: -8 },
               updatedBy: { type: 'string', minLength: 1, example: 'warehouse-1' },
               lotId: { ...idParam, example: 3 },
          },
     },
     response: {
          201: {
               description: 'Change recorded',
               type: 'object',
               properties: {
                    entry: journalEntrySchema,
                    allocations: { type: 'array', items: lotAllocationSchema },
               },
          },
          ...errorResponses,
     },
};

export const getItemHistorySchema = {
     tags: ['inventory'],
     summary: 'Journal entries of an item, most recent first',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: { itemId: idParam },
     },
     response: {
          200: { type: 'array', items: journalEntrySchema },
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getCurrentQuantitySchema = {
     tags: ['inventory'],
     summary: 'Stock on hand, summed over the journal',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: { itemId: idParam },
     },
     response: {
          200: {
               type: 'object',
               properties: {
                    itemId: { type: 'integer', example: 1 },
                    quantity: { type: 'number', example: 57 },
               },
          },
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};
