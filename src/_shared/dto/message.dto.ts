import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';

export const DEFAULT_PAGE_LIMIT = 50;
export const MAX_PAGE_LIMIT = 100;

const emptyToUndefined = ({ value }: { value: unknown }): unknown =>
  value === '' ? undefined : value;

/**
 * DTO for listing messages
 */
export class ListMessagesQueryDto {
  @ApiPropertyOptional({
    description: 'Exact sender address',
    example: '+919876543210',
  })
  @IsOptional()
  @Transform(emptyToUndefined)
  @IsString()
  from?: string;

  @ApiPropertyOptional({
    description: 'Inclusive lower bound on ts, compared as a string',
    example: '2025-01-15T09:00:00Z',
  })
  @IsOptional()
  @Transform(emptyToUndefined)
  @IsString()
  since?: string;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the message text',
    example: 'hello',
  })
  @IsOptional()
  @Transform(emptyToUndefined)
  @IsString()
  q?: string;

  @ApiPropertyOptional({
    description: 'Page size',
    default: DEFAULT_PAGE_LIMIT,
    minimum: 1,
    maximum: MAX_PAGE_LIMIT,
  })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_PAGE_LIMIT)
  limit: number = DEFAULT_PAGE_LIMIT;

  @ApiPropertyOptional({
    description: 'Number of results to skip',
    default: 0,
    minimum: 0,
  })
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset: number = 0;
}

export class MessageResponseItemDto {
  @ApiProperty({ example: 'm1' })
  message_id!: string;

  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: '+14155550100' })
  to!: string;

  @ApiProperty({ example: '2025-01-15T10:00:00Z' })
  ts!: string;

  @ApiProperty({ example: 'Hello', nullable: true, type: String })
  text!: string | null;
}

export class MessagesResponseDto {
  @ApiProperty({ type: [MessageResponseItemDto] })
  data!: MessageResponseItemDto[];

  @ApiProperty({ description: 'Size of the filtered set', example: 1 })
  total!: number;

  @ApiProperty({ example: DEFAULT_PAGE_LIMIT })
  limit!: number;

  @ApiProperty({ example: 0 })
  offset!: number;
}

export class SenderCountDto {
  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: 3 })
  count!: number;
}

export class StatsResponseDto {
  @ApiProperty({ example: 4 })
  total_messages!: number;

  @ApiProperty({ example: 2 })
  senders_count!: number;

  @ApiProperty({
    type: [SenderCountDto],
    description: 'Up to 10 senders, by count descending then address',
  })
  messages_per_sender!: SenderCountDto[];

  @ApiProperty({ example: '2025-01-15T09:00:00Z', nullable: true, type: String })
  first_message_ts!: string | null;

  @ApiProperty({ example: '2025-01-15T10:00:00Z', nullable: true, type: String })
  last_message_ts!: string | null;
}
