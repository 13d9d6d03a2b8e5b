import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
  HttpStatus,
  Inject,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable, tap } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import { MetricsEventHandler } from '../../../core';
import { METRICS_HANDLER } from '../constants';
import type { InboxRequest } from '../request.types';

/**
 * Request Logging Interceptor
 *
 * Emits one JSON access-log line per request and records the request in
 * the HTTP counters. Controllers can add fields through request.logContext.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  constructor(
    @Inject(METRICS_HANDLER)
    private readonly metrics: MetricsEventHandler,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<InboxRequest>();
    const response = http.getResponse<Response>();

    const startTime = performance.now();
    request.requestId = uuidv4();
    request.logContext = {};
    response.setHeader('x-request-id', request.requestId);

    return next.handle().pipe(
      tap({
        next: () => this.finish(request, response.statusCode, startTime),
        error: (error: unknown) =>
          this.finish(
            request,
            error instanceof HttpException
              ? error.getStatus()
              : HttpStatus.INTERNAL_SERVER_ERROR,
            startTime,
          ),
      }),
    );
  }

  private finish(request: InboxRequest, status: number, startTime: number): void {
    const latencyMs = performance.now() - startTime;
    const level = status >= 500 ? 'error' : 'info';

    this.metrics.recordHttpRequest(request.path, status, latencyMs);

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      request_id: request.requestId,
      method: request.method,
      path: request.path,
      status,
      latency_ms: Number(latencyMs.toFixed(2)),
      ...request.logContext,
    });

    if (level === 'error') {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }
  }
}
