/**
 * Inbox NestJS Module
 *
 * Main module for serving the webhook inbox from a NestJS application
 */

// Main module
export { InboxModule } from './inbox.module';

// Configuration
export {
  InboxModuleConfig,
  InboxModuleAsyncConfig,
  defaultInboxConfig,
  mergeInboxConfig,
  resolveLogLevels,
} from './inbox.config';
export * from './constants';

// Controllers
export * from './controllers';

// Services
export { ConfigurationService } from './services/configuration.service';

// Interceptors
export * from './interceptors';

export type { InboxRequest, RequestLogCarrier, RequestLogContext } from './request.types';
