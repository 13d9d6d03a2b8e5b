import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import {
  FieldError,
  MessagePage,
  MessageStats,
  MessageStore,
} from '../interfaces';
import { toFieldErrors } from '../utils';
import { ListMessagesQueryDto } from '../../_shared/dto/message.dto';

/**
 * Raised for list parameters outside their bounds
 */
export class InvalidQueryError extends Error {
  constructor(public readonly errors: FieldError[]) {
    super(`Invalid query: ${errors.map((e) => e.field).join(', ')}`);
    this.name = 'InvalidQueryError';
  }
}

/**
 * MessageQueryService
 *
 * Turns raw query parameters into store filters and shapes the page
 * envelope. No business logic beyond rejecting out-of-range parameters.
 */
export class MessageQueryService {
  constructor(private readonly store: MessageStore) {}

  async listMessages(query: Record<string, unknown> = {}): Promise<MessagePage> {
    const params = plainToInstance(ListMessagesQueryDto, query, {
      exposeUnsetFields: false,
    });

    const errors = await validate(params);
    if (errors.length > 0) {
      throw new InvalidQueryError(toFieldErrors(errors));
    }

    const { items, total } = await this.store.list({
      fromAddress: params.from,
      sinceTimestamp: params.since,
      textContains: params.q,
      limit: params.limit,
      offset: params.offset,
    });

    return {
      data: items,
      total,
      limit: params.limit,
      offset: params.offset,
    };
  }

  async getStats(): Promise<MessageStats> {
    return this.store.stats();
  }
}
