import { EventHandler, IngestionEvent } from '../../interfaces';

/**
 * Upper bounds of the latency histogram, in milliseconds
 */
export const LATENCY_BUCKETS_MS = [100, 500] as const;

interface LatencyHistogram {
  buckets: number[];
  count: number;
}

const createHistogram = (): LatencyHistogram => ({
  buckets: LATENCY_BUCKETS_MS.map(() => 0),
  count: 0,
});

/**
 * Metrics collection event handler
 *
 * Owns the process counters: ingestion results and latency from the event
 * sink, plus per-route HTTP counts recorded by the request interceptor.
 * Rendered as plain text lines.
 */
export class MetricsEventHandler {
  private webhookResults: Map<string, number> = new Map();
  private httpRequests: Map<string, number> = new Map();
  private webhookLatency = createHistogram();
  private requestLatency = createHistogram();

  getHandler(): EventHandler {
    return (event: IngestionEvent) => {
      this.increment(this.webhookResults, event.result);
      this.observe(this.webhookLatency, event.latencyMs);
    };
  }

  /**
   * Count one finished HTTP request
   */
  recordHttpRequest(path: string, status: number, latencyMs: number): void {
    this.increment(this.httpRequests, `path="${path}",status="${status}"`);
    this.observe(this.requestLatency, latencyMs);
  }

  getWebhookResultCount(result: string): number {
    return this.webhookResults.get(result) ?? 0;
  }

  render(): string {
    const lines: string[] = [];

    for (const [labels, value] of this.httpRequests) {
      lines.push(`http_requests_total{${labels}} ${value}`);
    }

    for (const [result, value] of this.webhookResults) {
      lines.push(`webhook_requests_total{result="${result}"} ${value}`);
    }

    lines.push(...this.renderHistogram('request_latency_ms', this.requestLatency));
    lines.push(...this.renderHistogram('webhook_latency_ms', this.webhookLatency));

    return lines.join('\n') + '\n';
  }

  reset(): void {
    this.webhookResults.clear();
    this.httpRequests.clear();
    this.webhookLatency = createHistogram();
    this.requestLatency = createHistogram();
  }

  private increment(counter: Map<string, number>, key: string): void {
    counter.set(key, (counter.get(key) ?? 0) + 1);
  }

  /**
   * Buckets are cumulative: an observation counts toward every bound it fits
   */
  private observe(histogram: LatencyHistogram, latencyMs: number): void {
    histogram.count++;
    LATENCY_BUCKETS_MS.forEach((bound, index) => {
      if (latencyMs <= bound) {
        histogram.buckets[index]++;
      }
    });
  }

  private renderHistogram(name: string, histogram: LatencyHistogram): string[] {
    return [
      ...LATENCY_BUCKETS_MS.map(
        (bound, index) => `${name}_bucket{le="${bound}"} ${histogram.buckets[index]}`,
      ),
      `${name}_bucket{le="+Inf"} ${histogram.count}`,
      `${name}_count ${histogram.count}`,
    ];
  }
}
