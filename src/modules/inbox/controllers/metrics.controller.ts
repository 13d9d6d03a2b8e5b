import { Controller, Get, Header, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MetricsEventHandler } from '../../../core';
import { METRICS_HANDLER } from '../constants';
import { ApiMetrics } from '../../../_shared/swagger/decorators';

@ApiTags('Health')
@Controller('metrics')
export class MetricsController {
  constructor(
    @Inject(METRICS_HANDLER)
    private readonly metrics: MetricsEventHandler,
  ) {}

  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiMetrics()
  render(): string {
    return this.metrics.render();
  }
}
