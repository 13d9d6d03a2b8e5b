import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse } from '@nestjs/swagger';

const okSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'ok' },
  },
};

/**
 * Swagger decorator for liveness
 */
export const ApiLivenessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness check',
      description: 'Always 200 once the process is serving',
    }),
    ApiResponse({ status: 200, description: 'Alive', schema: okSchema }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check',
      description:
        'Ready when a webhook secret is configured and the database answers',
    }),
    ApiResponse({ status: 200, description: 'Ready', schema: okSchema }),
    ApiResponse({
      status: 503,
      description: 'Secret missing or database unreachable',
    }),
  );
};

/**
 * Swagger decorator for the metrics endpoint
 */
export const ApiMetrics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Process metrics',
      description:
        'Plain-text counters: HTTP requests by path and status, webhook results, latency buckets',
    }),
    ApiProduces('text/plain'),
    ApiResponse({ status: 200, description: 'Metrics text' }),
  );
};
