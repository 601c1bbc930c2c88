// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Domain
export * from './domain/ledger-rules';

// Stores
export * from './stores/stock-store';
export * from './stores/pg-stock-store';

// Services
export * from './services/movement-log';
export * from './services/reservation-service';
export * from './services/expiration-sweeper';
export * from './services/stock-query-service';

// Types
export * from './types/inventory.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/config';
