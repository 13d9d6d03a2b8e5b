import { TextDecoder } from 'util';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { PipelineStage, IngestionContext, StageResult } from '../types';
import { IngestionOutcomeKind } from '../../domain/enums';
import { FieldError } from '../../interfaces';
import { toFieldErrors } from '../../utils';
import { WebhookPayloadDto } from '../../../_shared/dto/webhook.dto';

/**
 * Stage 2: Payload Validation
 * Parses the authenticated body and checks every field constraint
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  // Malformed byte sequences throw instead of becoming U+FFFD
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  async execute(context: IngestionContext): Promise<StageResult> {
    let text: string;
    try {
      text = this.decoder.decode(context.rawBody);
    } catch {
      return this.reject(context, [
        { field: 'body', messages: ['body must be valid UTF-8'] },
      ]);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return this.reject(context, [
        { field: 'body', messages: ['body must be valid JSON'] },
      ]);
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return this.reject(context, [
        { field: 'body', messages: ['body must be a JSON object'] },
      ]);
    }

    const payload = plainToInstance(WebhookPayloadDto, body);
    const errors = await validate(payload);

    if (errors.length > 0) {
      return this.reject(context, toFieldErrors(errors));
    }

    context.payload = payload;
    return { context, shouldContinue: true };
  }

  private reject(context: IngestionContext, errors: FieldError[]): StageResult {
    context.outcome = { kind: IngestionOutcomeKind.VALIDATION_ERROR, errors };
    return { context, shouldContinue: false };
  }
}
