import { Logger } from '@nestjs/common';
import { EventHandler, IngestionEvent } from '../../interfaces';
import { IngestionResult } from '../../domain/enums';

/**
 * Logging event handler
 * Logs every ingestion outcome; failures at warn, the rest at debug
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Logger = new Logger('IngestionEvents'),
  ) {}

  getHandler(): EventHandler {
    return (event: IngestionEvent) => {
      const line = JSON.stringify({
        result: event.result,
        message_id: event.messageId,
        latency_ms: Number(event.latencyMs.toFixed(2)),
        ts: event.occurredAt.toISOString(),
      });

      if (event.result === IngestionResult.INTERNAL_ERROR) {
        this.logger.warn(line);
      } else {
        this.logger.debug(line);
      }
    };
  }
}
