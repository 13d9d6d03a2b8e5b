import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { resolveLogLevels } from './modules';

async function bootstrap() {
  // Signatures are computed over the exact bytes received, so every body
  // is kept as a Buffer and parsed later by the ingestion pipeline.
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    rawBody: true,
    bodyParser: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  app.useBodyParser('raw', { type: '*/*' });
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Webhook Inbox')
    .setDescription(
      'Receives HMAC-signed messages, stores each message_id once and serves paginated listings and statistics.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive signed messages')
    .addTag('Query', 'List stored messages and aggregate statistics')
    .addTag('Health', 'Liveness, readiness and metrics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = Number(process.env.PORT ?? 8000);
  const logger = new Logger('Bootstrap');
  await app.listen(port);
  logger.log(`Webhook inbox listening on http://localhost:${port}`);
  logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    error instanceof Error ? error.stack ?? error.message : String(error),
  );
  process.exit(1);
});
