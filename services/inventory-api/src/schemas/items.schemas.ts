import { errorResponses, idParam, itemSchema, lotSchema, pageQuerystring } from './common.schemas';

export const createItemSchema = {
     tags: ['items'],
     summary: 'Create a catalog item',
     body: {
          type: 'object',
          required: ['name'],
          properties: {
               name: { type: 'string', minLength: 1, maxLength: 200, example: 'Oat Milk 1L' },
               description: { type: 'string', maxLength: 2000 },
          },
     },
     response: {
          201: { description: 'Item created', ...itemSchema },
          400: errorResponses[400],
          409: errorResponses[409],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const listItemsSchema = {
     tags: ['items'],
     summary: 'List catalog items',
     querystring: pageQuerystring,
     response: {
          200: { type: 'array', items: itemSchema },
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getItemSchema = {
     tags: ['items'],
     summary: 'Get a catalog item',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: { itemId: idParam },
     },
     response: {
          200: itemSchema,
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};

export const getItemLotsSchema = {
     tags: ['items', 'lots'],
     summary: 'List the lots of an item in FIFO order',
     description:
          'Lots are ordered by creation (oldest first), the order in which withdrawals without an explicit lot drain them.',
     params: {
          type: 'object',
          required: ['itemId'],
          properties: { itemId: idParam },
     },
     querystring: {
          type: 'object',
          properties: {
               excludeEmpty: { type: 'boolean', default: true },
          },
     },
     response: {
          200: { type: 'array', items: lotSchema },
          404: errorResponses[404],
          500: errorResponses[500],
          503: errorResponses[503],
     },
};
