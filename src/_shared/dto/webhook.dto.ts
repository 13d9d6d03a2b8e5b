import {
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  E164_PATTERN,
  IsUtcTimestamp,
  MAX_TEXT_CODE_POINTS,
  MaxCodePoints,
} from './validators';

/**
 * Inbound webhook payload. Property names follow the wire format.
 */
export class WebhookPayloadDto {
  @ApiProperty({
    description: 'Sender-assigned unique message identifier',
    example: 'm1',
  })
  @IsString()
  @IsNotEmpty()
  message_id!: string;

  @ApiProperty({
    description: 'Sender address: "+" followed by digits',
    example: '+919876543210',
    pattern: E164_PATTERN.source,
  })
  @IsString()
  @Matches(E164_PATTERN, {
    message: 'from must start with "+" followed by digits',
  })
  from!: string;

  @ApiProperty({
    description: 'Recipient address: "+" followed by digits',
    example: '+14155550100',
    pattern: E164_PATTERN.source,
  })
  @IsString()
  @Matches(E164_PATTERN, {
    message: 'to must start with "+" followed by digits',
  })
  to!: string;

  @ApiProperty({
    description:
      'Message time as YYYY-MM-DDTHH:MM:SSZ. Whole seconds only: fractional seconds and UTC offsets are rejected with 422.',
    pattern: '^\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2}Z$',
    example: '2025-01-15T10:00:00Z',
  })
  @IsString()
  @IsUtcTimestamp()
  ts!: string;

  @ApiPropertyOptional({
    description: 'Message body',
    example: 'Hello',
    maxLength: MAX_TEXT_CODE_POINTS,
    nullable: true,
  })
  @IsOptional()
  @IsString()
  @MaxCodePoints(MAX_TEXT_CODE_POINTS)
  text?: string | null;
}

/**
 * Response DTO for accepted webhooks. Created and duplicate deliveries
 * answer identically.
 */
export class WebhookResponseDto {
  @ApiProperty({ example: 'ok' })
  status!: 'ok';
}

/**
 * One entry of a validation failure response
 */
export class FieldErrorDto {
  @ApiProperty({ example: 'from' })
  field!: string;

  @ApiProperty({
    type: [String],
    example: ['from must start with "+" followed by digits'],
  })
  messages!: string[];
}

export class ValidationErrorResponseDto {
  @ApiProperty({ type: [FieldErrorDto] })
  detail!: FieldErrorDto[];
}
