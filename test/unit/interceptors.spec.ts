import { Logger, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import {
  InboxRequest,
  MetricsEventHandler,
  RawBodyInterceptor,
  RequestLoggingInterceptor,
} from '../../src';

interface FakeRequest extends Partial<InboxRequest> {
  body?: unknown;
}

const createResponse = (statusCode = 200) => {
  const headers: Record<string, string> = {};
  return {
    statusCode,
    headers,
    setHeader: (name: string, value: string) => {
      headers[name] = value;
    },
  };
};

describe('RawBodyInterceptor', () => {
  const interceptor = new RawBodyInterceptor();
  const next = { handle: () => of(null) };

  it('should prefer the captured raw body', async () => {
    const rawBody = Buffer.from('{"a":1}');
    const request: FakeRequest = { rawBody, body: { a: 1 } };

    await lastValueFrom(interceptor.intercept(new ExecutionContextHost([request]), next));

    expect(request.body).toBe(rawBody);
  });

  it('should keep a Buffer body from the raw parser', async () => {
    const body = Buffer.from('{"a":1}');
    const request: FakeRequest = { body };

    await lastValueFrom(interceptor.intercept(new ExecutionContextHost([request]), next));

    expect(request.rawBody).toBe(body);
  });

  it('should substitute an empty buffer when nothing arrived as bytes', async () => {
    const request: FakeRequest = { body: {} };

    await lastValueFrom(interceptor.intercept(new ExecutionContextHost([request]), next));

    expect(request.body).toEqual(Buffer.alloc(0));
  });
});

describe('RequestLoggingInterceptor', () => {
  let metrics: MetricsEventHandler;
  let interceptor: RequestLoggingInterceptor;
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    metrics = new MetricsEventHandler();
    interceptor = new RequestLoggingInterceptor(metrics);
    log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
    error.mockRestore();
  });

  it('should log one JSON line with the fields the handler added', async () => {
    const request: FakeRequest = { method: 'POST', path: '/webhook' };
    const response = createResponse(200);

    await lastValueFrom(
      interceptor.intercept(new ExecutionContextHost([request, response]), {
        handle: () => {
          request.logContext = { message_id: 'm1', dup: false, result: 'created' };
          return of({ status: 'ok' });
        },
      }),
    );

    expect(log).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(log.mock.calls[0][0]));
    expect(line).toMatchObject({
      level: 'info',
      request_id: response.headers['x-request-id'],
      method: 'POST',
      path: '/webhook',
      status: 200,
      message_id: 'm1',
      dup: false,
      result: 'created',
    });
    expect(typeof line.latency_ms).toBe('number');
    expect(metrics.render()).toContain(
      'http_requests_total{path="/webhook",status="200"} 1\n',
    );
  });

  it('should record the status of an HTTP exception', async () => {
    const request: FakeRequest = { method: 'POST', path: '/webhook' };

    await expect(
      lastValueFrom(
        interceptor.intercept(new ExecutionContextHost([request, createResponse()]), {
          handle: () => throwError(() => new UnauthorizedException('invalid signature')),
        }),
      ),
    ).rejects.toThrow(UnauthorizedException);

    expect(metrics.render()).toContain(
      'http_requests_total{path="/webhook",status="401"} 1\n',
    );
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('should log unexpected errors as 500 at error level', async () => {
    const request: FakeRequest = { method: 'GET', path: '/stats' };

    await expect(
      lastValueFrom(
        interceptor.intercept(new ExecutionContextHost([request, createResponse()]), {
          handle: () => throwError(() => new Error('db gone')),
        }),
      ),
    ).rejects.toThrow('db gone');

    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({
      level: 'error',
      status: 500,
      path: '/stats',
    });
  });
});
