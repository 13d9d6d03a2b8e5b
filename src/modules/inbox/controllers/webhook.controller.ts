import {
  Controller,
  Post,
  Body,
  Headers,
  Req,
  HttpCode,
  HttpStatus,
  UseInterceptors,
  Inject,
  Logger,
  ServiceUnavailableException,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { IncomingHttpHeaders } from 'http';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import {
  IngestionHandler,
  IngestionOutcomeKind,
  OUTCOME_RESULTS,
} from '../../../core';
import { ApiWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { WebhookResponseDto } from '../../../_shared/dto';
import { INGESTION_HANDLER } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import type { RequestLogCarrier } from '../request.types';

/**
 * Webhook Controller
 *
 * Receives signed messages. Missing and wrong signatures get the same
 * answer so callers cannot tell them apart.
 */
@ApiTags('Ingest')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(INGESTION_HANDLER)
    private readonly ingestionHandler: IngestionHandler,
    private readonly configuration: ConfigurationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async handleWebhook(
    @Body() rawBody: Buffer,
    @Headers() headers: IncomingHttpHeaders,
    @Req() request: RequestLogCarrier,
  ): Promise<WebhookResponseDto> {
    const outcome = await this.ingestionHandler.ingest(
      rawBody,
      this.readSignature(headers),
    );

    const logContext = request.logContext ?? {};
    request.logContext = logContext;
    logContext.result = OUTCOME_RESULTS[outcome.kind];

    switch (outcome.kind) {
      case IngestionOutcomeKind.UNCONFIGURED:
        throw new ServiceUnavailableException('WEBHOOK_SECRET not configured');

      case IngestionOutcomeKind.MISSING_SIGNATURE:
      case IngestionOutcomeKind.INVALID_SIGNATURE:
        logContext.dup = false;
        throw new UnauthorizedException('invalid signature');

      case IngestionOutcomeKind.VALIDATION_ERROR:
        throw new UnprocessableEntityException({ detail: outcome.errors });

      case IngestionOutcomeKind.CREATED:
      case IngestionOutcomeKind.DUPLICATE:
        logContext.message_id = outcome.message.messageId;
        logContext.dup = outcome.kind === IngestionOutcomeKind.DUPLICATE;
        this.logger.debug(
          `Message ${outcome.message.messageId} ${logContext.dup ? 'already stored' : 'stored'}`,
        );
        return { status: 'ok' };
    }
  }

  private readSignature(headers: IncomingHttpHeaders): string | undefined {
    const value = headers[this.configuration.getSignatureHeader()];
    return Array.isArray(value) ? value[0] : value;
  }
}
