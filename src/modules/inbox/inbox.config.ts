import {
  InjectionToken,
  LogLevel,
  ModuleMetadata,
  OptionalFactoryDependency,
} from '@nestjs/common';
import { DataSourceOptions } from 'typeorm';
import { EventHandler, MessageStore, SignatureVerifier } from '../../core';
import { DEFAULT_DATABASE_URL } from '../../adapters/storage/typeorm';
import { DEFAULT_SIGNATURE_HEADER } from './constants';

/**
 * Inbox Module Configuration
 */
export interface InboxModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';

    /**
     * sqlite:///path, sqlite:////abs/path, sqlite:// (memory) or postgres:// URL
     */
    databaseUrl?: string;

    /**
     * Extra TypeORM options merged over the ones derived from databaseUrl
     */
    options?: Partial<DataSourceOptions>;

    /**
     * Used with type 'custom'. The module closes it on shutdown.
     */
    adapter?: MessageStore;
  };

  /**
   * Webhook authentication
   */
  webhook: {
    /**
     * Shared HMAC secret. Without it ingestion answers 503 and the
     * service reports not ready.
     */
    secret?: string;

    /**
     * Header carrying the hex signature, matched case-insensitively
     * Default: x-signature
     */
    signatureHeader?: string;

    /**
     * Custom verifier (default: HMAC-SHA256)
     */
    verifier?: SignatureVerifier;
  };

  /**
   * Event sink configuration
   */
  events?: {
    enableLogging?: boolean;
    enableMetrics?: boolean;
    handlers?: EventHandler[];
  };
}

/**
 * Async configuration options
 */
export interface InboxModuleAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (
    ...args: any[]
  ) => Promise<InboxModuleConfig> | InboxModuleConfig;
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}

/**
 * Default configuration values
 */
export const defaultInboxConfig: InboxModuleConfig = {
  storage: {
    type: 'typeorm',
    databaseUrl: DEFAULT_DATABASE_URL,
  },
  webhook: {
    signatureHeader: DEFAULT_SIGNATURE_HEADER,
  },
  events: {
    enableLogging: true,
    enableMetrics: true,
  },
};

/**
 * Merge a partial configuration over the defaults, section by section
 */
export const mergeInboxConfig = (config: InboxModuleConfig): InboxModuleConfig => ({
  ...defaultInboxConfig,
  ...config,
  storage: { ...defaultInboxConfig.storage, ...config.storage },
  webhook: { ...defaultInboxConfig.webhook, ...config.webhook },
  events: { ...defaultInboxConfig.events, ...config.events },
});

const LOG_LEVELS: Record<string, LogLevel[]> = {
  DEBUG: ['error', 'warn', 'log', 'debug', 'verbose'],
  INFO: ['error', 'warn', 'log'],
  WARNING: ['error', 'warn'],
  WARN: ['error', 'warn'],
  ERROR: ['error', 'fatal'],
};

/**
 * Translate a LOG_LEVEL value into Nest logger levels (default INFO)
 */
export const resolveLogLevels = (level?: string): LogLevel[] =>
  LOG_LEVELS[(level || 'INFO').toUpperCase()] ?? LOG_LEVELS.INFO;
