import {
  Controller,
  Get,
  Inject,
  HttpStatus,
  HttpCode,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { MessageStore } from '../../../core';
import { MESSAGE_STORE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import {
  ApiLivenessCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 * Ready means: secret configured AND storage reachable
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiLivenessCheck()
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  @HttpCode(HttpStatus.OK)
  @ApiReadinessCheck()
  async ready(): Promise<{ status: string }> {
    if (!this.configuration.isSecretConfigured()) {
      throw new ServiceUnavailableException('WEBHOOK_SECRET not set');
    }

    if (!(await this.store.isHealthy())) {
      throw new ServiceUnavailableException('database unreachable');
    }

    return { status: 'ok' };
  }
}
