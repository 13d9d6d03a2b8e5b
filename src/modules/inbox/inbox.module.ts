import {
  DynamicModule,
  Global,
  Inject,
  Module,
  OnApplicationShutdown,
  Provider,
  Type,
} from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';
import {
  EventDispatcher,
  EventDispatcherImpl,
  HmacSignatureVerifier,
  IngestionHandler,
  LoggingEventHandler,
  MessageQueryService,
  MessageStore,
  MetricsEventHandler,
  SignatureVerifier,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import {
  TypeORMStorageAdapter,
  createDataSource,
} from '../../adapters/storage/typeorm';
import {
  InboxModuleAsyncConfig,
  InboxModuleConfig,
  mergeInboxConfig,
} from './inbox.config';
import {
  EVENT_DISPATCHER,
  INBOX_CONFIG,
  INGESTION_HANDLER,
  MESSAGE_QUERY_SERVICE,
  MESSAGE_STORE,
  METRICS_HANDLER,
  SIGNATURE_VERIFIER,
} from './constants';
import {
  HealthController,
  MessageController,
  MetricsController,
  WebhookController,
} from './controllers';
import { RequestLoggingInterceptor } from './interceptors';
import { ConfigurationService } from './services/configuration.service';

const EXPORTED_TOKENS = [
  INBOX_CONFIG,
  MESSAGE_STORE,
  EVENT_DISPATCHER,
  METRICS_HANDLER,
  INGESTION_HANDLER,
  MESSAGE_QUERY_SERVICE,
  ConfigurationService,
];

/**
 * Inbox Module - Main NestJS Module
 *
 * Wires storage, signature verification, the ingestion pipeline and the
 * query side from one configuration object
 */
@Global()
@Module({})
export class InboxModule implements OnApplicationShutdown {
  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
  ) {}

  /**
   * Close the store's connections (the TypeORM DataSource) on shutdown
   */
  async onApplicationShutdown(): Promise<void> {
    await this.store.close();
  }

  /**
   * Configure the inbox synchronously
   */
  static forRoot(config: InboxModuleConfig): DynamicModule {
    return {
      module: InboxModule,
      providers: [
        {
          provide: INBOX_CONFIG,
          useValue: mergeInboxConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the inbox asynchronously
   */
  static forRootAsync(options: InboxModuleAsyncConfig): DynamicModule {
    return {
      module: InboxModule,
      imports: options.imports || [],
      providers: [
        {
          provide: INBOX_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeInboxConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: this.createControllers(),
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers that read the resolved INBOX_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: MESSAGE_STORE,
        useFactory: async (config: InboxModuleConfig): Promise<MessageStore> => {
          switch (config.storage.type) {
            case 'mock':
              return new MockStorageAdapter();

            case 'typeorm': {
              const dataSource = createDataSource(
                config.storage.databaseUrl,
                config.storage.options,
              );
              await dataSource.initialize();
              return new TypeORMStorageAdapter(dataSource);
            }

            case 'custom':
              if (!config.storage.adapter) {
                throw new Error('Custom storage adapter not provided');
              }
              return config.storage.adapter;

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [INBOX_CONFIG],
      },
      {
        provide: METRICS_HANDLER,
        useFactory: () => new MetricsEventHandler(),
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (
          config: InboxModuleConfig,
          metricsHandler: MetricsEventHandler,
        ): EventDispatcher => {
          const dispatcher = new EventDispatcherImpl();

          if (config.events?.enableLogging) {
            dispatcher.onAll(new LoggingEventHandler().getHandler());
          }

          if (config.events?.enableMetrics) {
            dispatcher.onAll(metricsHandler.getHandler());
          }

          for (const handler of config.events?.handlers ?? []) {
            dispatcher.onAll(handler);
          }

          return dispatcher;
        },
        inject: [INBOX_CONFIG, METRICS_HANDLER],
      },
      {
        provide: SIGNATURE_VERIFIER,
        useFactory: (config: InboxModuleConfig): SignatureVerifier =>
          config.webhook.verifier ?? new HmacSignatureVerifier(),
        inject: [INBOX_CONFIG],
      },
      {
        provide: INGESTION_HANDLER,
        useFactory: (
          config: InboxModuleConfig,
          store: MessageStore,
          verifier: SignatureVerifier,
          eventDispatcher: EventDispatcher,
        ) =>
          new IngestionHandler({
            store,
            secret: config.webhook.secret,
            verifier,
            eventDispatcher,
          }),
        inject: [INBOX_CONFIG, MESSAGE_STORE, SIGNATURE_VERIFIER, EVENT_DISPATCHER],
      },
      {
        provide: MESSAGE_QUERY_SERVICE,
        useFactory: (store: MessageStore) => new MessageQueryService(store),
        inject: [MESSAGE_STORE],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
      {
        provide: APP_INTERCEPTOR,
        useClass: RequestLoggingInterceptor,
      },
    ];
  }

  private static createControllers(): Type<unknown>[] {
    return [
      WebhookController,
      MessageController,
      HealthController,
      MetricsController,
    ];
  }
}
