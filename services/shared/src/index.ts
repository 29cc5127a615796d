// Configuration
export * from './config';

// Database
export * from './db/client';
export * from './repositories';

// Messaging
export * from './messaging/client';
export * from './messaging/event-publisher';

// Services
export * from './services/stock-ledger';
export * from './services/reservation-store';
export * from './services/inventory-engine';
export * from './services/expiry-sweeper';

// Clients
export * from './clients/product-client';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/timeout';
