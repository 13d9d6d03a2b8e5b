/**
 * Inbox Core - ingestion pipeline, storage port and query service
 * Framework and database agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Signature verification
export * from './verification';

// Helpers
export * from './utils';

// Ingestion pipeline
export * from './pipeline';

// Core services
export * from './services';

// Event system
export * from './events';
