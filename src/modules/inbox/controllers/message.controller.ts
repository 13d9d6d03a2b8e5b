import {
  Controller,
  Get,
  Query,
  Inject,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  InvalidQueryError,
  Message,
  MessageQueryService,
} from '../../../core';
import {
  ApiListMessages,
  ApiMessageStatistics,
} from '../../../_shared/swagger/decorators';
import {
  MessageResponseItemDto,
  MessagesResponseDto,
  StatsResponseDto,
} from '../../../_shared/dto';
import { MESSAGE_QUERY_SERVICE } from '../constants';

/**
 * Message Controller
 * Read side: paginated listing and aggregate statistics
 */
@ApiTags('Query')
@Controller()
export class MessageController {
  constructor(
    @Inject(MESSAGE_QUERY_SERVICE)
    private readonly queryService: MessageQueryService,
  ) {}

  @Get('messages')
  @ApiListMessages()
  async listMessages(
    @Query() query: Record<string, unknown>,
  ): Promise<MessagesResponseDto> {
    try {
      const page = await this.queryService.listMessages(query);
      return {
        data: page.data.map((message) => this.toResponseItem(message)),
        total: page.total,
        limit: page.limit,
        offset: page.offset,
      };
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        throw new UnprocessableEntityException({ detail: error.errors });
      }
      throw error;
    }
  }

  @Get('stats')
  @ApiMessageStatistics()
  async statistics(): Promise<StatsResponseDto> {
    const stats = await this.queryService.getStats();

    return {
      total_messages: stats.totalMessages,
      senders_count: stats.distinctSenderCount,
      messages_per_sender: stats.topSenders.map(({ sender, count }) => ({
        from: sender,
        count,
      })),
      first_message_ts: stats.earliestTimestamp,
      last_message_ts: stats.latestTimestamp,
    };
  }

  private toResponseItem(message: Message): MessageResponseItemDto {
    return {
      message_id: message.messageId,
      from: message.fromAddress,
      to: message.toAddress,
      ts: message.timestamp,
      text: message.text,
    };
  }
}
