// Database
export * from './db/client';

// Messaging
export * from './messaging/client';
export * from './messaging/outbox';

// Services
export * from './services/item-catalog';
export * from './services/lot-ledger';
export * from './services/inventory-journal';
export * from './services/fifo-planner';
export * from './services/allocation-engine';
export * from './services/purchase-recorder';

// Types
export * from './types/ledger.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/result';
export * from './utils/quantity';
export * from './utils/pg-errors';
