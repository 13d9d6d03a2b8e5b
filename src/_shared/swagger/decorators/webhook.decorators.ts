import { applyDecorators } from '@nestjs/common';
import {
  ApiOperation,
  ApiResponse,
  ApiBody,
  ApiHeader,
  ApiConsumes,
} from '@nestjs/swagger';
import {
  ValidationErrorResponseDto,
  WebhookPayloadDto,
  WebhookResponseDto,
} from '../../dto/webhook.dto';

/**
 * Swagger decorator for the webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive a signed message',
      description:
        'Verifies the HMAC-SHA256 signature over the raw body, validates the payload and stores it once per message_id. Replays of a stored message_id answer exactly like the first delivery.',
    }),
    ApiConsumes('application/json'),
    ApiHeader({
      name: 'X-Signature',
      description: 'Hex HMAC-SHA256 of the raw request body keyed by the shared secret',
      required: true,
      example: '3c5e0f1f0d4b7a8e6c2d9b1a4f7e3c6d8b0a2f5e7c9d1b3a5f7e9c1d3b5a7f9e',
    }),
    ApiBody({ type: WebhookPayloadDto }),
    ApiResponse({
      status: 200,
      description: 'Stored, or already stored under this message_id',
      type: WebhookResponseDto,
    }),
    ApiResponse({
      status: 401,
      description: 'Signature missing or invalid',
    }),
    ApiResponse({
      status: 422,
      description: 'Payload failed validation',
      type: ValidationErrorResponseDto,
    }),
    ApiResponse({
      status: 503,
      description: 'No webhook secret configured',
    }),
  );
};
