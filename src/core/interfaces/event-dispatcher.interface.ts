import { IngestionResult } from '../domain/enums';

/**
 * Immutable record emitted once per ingestion call
 */
export interface IngestionEvent {
  readonly result: IngestionResult;
  readonly latencyMs: number;
  readonly messageId?: string;
  readonly occurredAt: Date;
}

/**
 * Event handler function signature
 */
export type EventHandler = (event: IngestionEvent) => Promise<void> | void;

/**
 * Subscription handle returned on registration
 */
export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}

/**
 * Event sink the ingestion core reports to. Aggregation and its
 * concurrency discipline belong to the handlers, not the core.
 */
export interface EventDispatcher {
  /**
   * Register a handler for one result class
   */
  on(result: IngestionResult, handler: EventHandler): EventSubscription;

  /**
   * Register a handler for every event
   */
  onAll(handler: EventHandler): EventSubscription;

  /**
   * Remove a handler registered with on()
   */
  off(result: IngestionResult, handler: EventHandler): void;

  /**
   * Deliver an event to all matching handlers. Handler failures are
   * isolated and never reach the caller.
   */
  dispatch(event: IngestionEvent): Promise<void>;
}
