import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse } from '@nestjs/swagger';
import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MessagesResponseDto,
  StatsResponseDto,
} from '../../dto/message.dto';
import { ValidationErrorResponseDto } from '../../dto/webhook.dto';

/**
 * Swagger decorator for listing messages
 */
export const ApiListMessages = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List stored messages',
      description:
        'Ordered by ts then message_id, both ascending, so pages stay stable across calls. total counts every match before pagination.',
    }),
    ApiQuery({
      name: 'from',
      required: false,
      description: 'Exact sender address',
      example: '+919876543210',
    }),
    ApiQuery({
      name: 'since',
      required: false,
      description: 'Inclusive lower bound on ts',
      example: '2025-01-15T09:00:00Z',
    }),
    ApiQuery({
      name: 'q',
      required: false,
      description: 'Case-insensitive text search',
    }),
    ApiQuery({
      name: 'limit',
      required: false,
      schema: { type: 'integer', minimum: 1, maximum: MAX_PAGE_LIMIT, default: DEFAULT_PAGE_LIMIT },
    }),
    ApiQuery({
      name: 'offset',
      required: false,
      schema: { type: 'integer', minimum: 0, default: 0 },
    }),
    ApiResponse({
      status: 200,
      description: 'One page of messages',
      type: MessagesResponseDto,
    }),
    ApiResponse({
      status: 422,
      description: 'limit or offset out of range',
      type: ValidationErrorResponseDto,
    }),
  );
};

/**
 * Swagger decorator for message statistics
 */
export const ApiMessageStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Aggregate statistics',
      description: 'Totals, distinct senders, top 10 senders and the ts range',
    }),
    ApiResponse({
      status: 200,
      description: 'Statistics over every stored message',
      type: StatsResponseDto,
    }),
  );
};
