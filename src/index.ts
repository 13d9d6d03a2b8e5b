/**
 * Webhook Inbox
 *
 * Signed message ingestion with idempotent storage and a paginated query side.
 */

// Export all core components
export * from './core';

// Export testing utilities from _shared
export { MockWebhookFactory } from './_shared/testing/mock-webhook-factory';
export type {
  SignedWebhook,
  WebhookMessagePayload,
} from './_shared/testing/mock-webhook-factory';

// Export DTOs
export * from './_shared/dto';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';

// Export NestJS module, configuration, controllers and interceptors
export * from './modules';
