import { IngestionEvent, IngestionResult, MetricsEventHandler } from '../../src';

const event = (result: IngestionResult, latencyMs: number): IngestionEvent => ({
  result,
  latencyMs,
  occurredAt: new Date('2025-01-15T10:00:00Z'),
});

describe('MetricsEventHandler', () => {
  let metrics: MetricsEventHandler;

  beforeEach(() => {
    metrics = new MetricsEventHandler();
  });

  it('should render only empty histograms before any traffic', () => {
    expect(metrics.render()).toBe(
      [
        'request_latency_ms_bucket{le="100"} 0',
        'request_latency_ms_bucket{le="500"} 0',
        'request_latency_ms_bucket{le="+Inf"} 0',
        'request_latency_ms_count 0',
        'webhook_latency_ms_bucket{le="100"} 0',
        'webhook_latency_ms_bucket{le="500"} 0',
        'webhook_latency_ms_bucket{le="+Inf"} 0',
        'webhook_latency_ms_count 0',
        '',
      ].join('\n'),
    );
  });

  it('should count results and requests with cumulative latency buckets', async () => {
    const handler = metrics.getHandler();

    metrics.recordHttpRequest('/webhook', 200, 12);
    metrics.recordHttpRequest('/webhook', 401, 600);
    await handler(event(IngestionResult.CREATED, 50));
    await handler(event(IngestionResult.DUPLICATE, 150));

    expect(metrics.render()).toBe(
      [
        'http_requests_total{path="/webhook",status="200"} 1',
        'http_requests_total{path="/webhook",status="401"} 1',
        'webhook_requests_total{result="created"} 1',
        'webhook_requests_total{result="duplicate"} 1',
        'request_latency_ms_bucket{le="100"} 1',
        'request_latency_ms_bucket{le="500"} 1',
        'request_latency_ms_bucket{le="+Inf"} 2',
        'request_latency_ms_count 2',
        'webhook_latency_ms_bucket{le="100"} 1',
        'webhook_latency_ms_bucket{le="500"} 2',
        'webhook_latency_ms_bucket{le="+Inf"} 2',
        'webhook_latency_ms_count 2',
        '',
      ].join('\n'),
    );
  });

  it('should count a latency equal to a bound inside that bucket', async () => {
    await metrics.getHandler()(event(IngestionResult.CREATED, 100));

    expect(metrics.render()).toContain('webhook_latency_ms_bucket{le="100"} 1\n');
  });

  it('should accumulate per result class', async () => {
    const handler = metrics.getHandler();
    await handler(event(IngestionResult.INVALID_SIGNATURE, 1));
    await handler(event(IngestionResult.INVALID_SIGNATURE, 1));
    await handler(event(IngestionResult.VALIDATION_ERROR, 1));

    expect(metrics.getWebhookResultCount(IngestionResult.INVALID_SIGNATURE)).toBe(2);
    expect(metrics.getWebhookResultCount(IngestionResult.VALIDATION_ERROR)).toBe(1);
    expect(metrics.getWebhookResultCount(IngestionResult.CREATED)).toBe(0);
  });

  it('should clear everything on reset', async () => {
    await metrics.getHandler()(event(IngestionResult.CREATED, 1));
    metrics.recordHttpRequest('/stats', 200, 1);

    metrics.reset();

    expect(metrics.getWebhookResultCount(IngestionResult.CREATED)).toBe(0);
    expect(metrics.render()).not.toContain('http_requests_total');
  });
});
