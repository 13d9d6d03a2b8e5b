import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { InboxModule, InboxModuleConfig } from './modules';
import { DEFAULT_DATABASE_URL } from './adapters/storage/typeorm';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    InboxModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService): InboxModuleConfig => ({
        storage: {
          type: 'typeorm',
          databaseUrl: config.get<string>('DATABASE_URL') || DEFAULT_DATABASE_URL,
        },
        webhook: {
          secret: config.get<string>('WEBHOOK_SECRET'),
        },
        events: {
          enableLogging: true,
          enableMetrics: true,
        },
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
