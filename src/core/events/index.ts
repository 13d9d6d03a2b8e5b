/**
 * Event System
 * Dispatching and handling of ingestion outcome events
 */

// Event dispatcher implementation
export { EventDispatcherImpl } from './event-dispatcher.impl';

// Built-in event handlers
export { LoggingEventHandler } from './handlers/logging.handler';
export {
  MetricsEventHandler,
  LATENCY_BUCKETS_MS,
} from './handlers/metrics.handler';
