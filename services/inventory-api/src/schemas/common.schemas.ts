// Shared JSON schema fragments for request validation and response serialization

export const idParam = {
     type: 'integer',
     minimum: 1,
} as const;

export const pageQuerystring = {
     type: 'object',
     properties: {
          skip: { type: 'integer', minimum: 0, default: 0 },
          limit: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
          itemId: { type: 'integer', minimum: 1 },
     },
} as const;

export const errorResponse = {
     type: 'object',
     additionalProperties: true,
     properties: {
          error: { type: 'string', example: 'ITEM_NOT_FOUND' },
          message: { type: 'string', example: 'Item 42 not found' },
     },
} as const;

export const errorResponses = {
     400: { description: 'Invalid request', ...errorResponse },
     404: { description: 'Referenced record not found', ...errorResponse },
     409: { description: 'Conflict with current ledger state', ...errorResponse },
     500: { description: 'Internal server error', ...errorResponse },
     503: { description: 'Database unavailable', ...errorResponse },
} as const;

export const itemSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 1 },
          name: { type: 'string', example: 'Arabica Beans 1kg' },
          description: { type: 'string', nullable: true },
          createdAt: { type: 'string', format: 'date-time' },
     },
} as const;

export const lotSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 3 },
          purchaseId: { type: 'integer', example: 7 },
          itemId: { type: 'integer', example: 1 },
          lotNumber: { type: 'string', example: 'LOT-7' },
          manufacturingDate: { type: 'string', nullable: true, example: '2027-06-30' },
          expiryDate: { type: 'string', nullable: true, example: '2027-06-30' },
          initialQuantity: { type: 'number', example: 40 },
          remainingQuantity: { type: 'number', example: 12.5 },
          createdAt: { type: 'string', format: 'date-time' },
     },
} as const;

export const journalEntrySchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 18 },
          itemId: { type: 'integer', example: 1 },
          lotId: { type: 'integer', nullable: true, example: 3 },
          quantity: { type: 'number', example: -8 },
          updatedBy: { type: 'string', example: 'warehouse-1' },
          timestamp: { type: 'string', format: 'date-time' },
     },
} as const;

export const lotAllocationSchema = {
     type: 'object',
     properties: {
          lotId: { type: 'integer', example: 3 },
          quantity: { type: 'number', example: 5 },
     },
} as const;

export const purchaseSchema = {
     type: 'object',
     properties: {
          id: { type: 'integer', example: 7 },
          itemId: { type: 'integer', example: 1 },
          quantity: { type: 'number', example: 40 },
          type: { type: 'string', enum: ['domestic', 'imported'] },
          supplier: { type: 'string', example: 'Harbor Imports' },
          unitPrice: { type: 'number', example: 12.5 },
          createdBy: { type: 'string', example: 'buyer-2' },
          purchaseDate: { type: 'string', format: 'date-time' },
          lot: { ...lotSchema, nullable: true },
     },
} as const;
