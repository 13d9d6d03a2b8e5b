import { Logger } from '@nestjs/common';
import { IngestionResult } from '../domain/enums';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  IngestionEvent,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per result class with error isolation.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<IngestionResult, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  on(result: IngestionResult, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    const handlers = this.handlers.get(result) ?? new Set<EventHandler>();
    handlers.add(handler);
    this.handlers.set(result, handlers);

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(result, handler),
    };
  }

  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(result: IngestionResult, handler: EventHandler): void {
    const handlers = this.handlers.get(result);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(result);
      }
    }
  }

  /**
   * Remove all handlers, or only those registered for one result class
   */
  removeAllHandlers(result?: IngestionResult): void {
    if (result) {
      this.handlers.delete(result);
      return;
    }

    this.handlers.clear();
    this.globalHandlers.clear();
  }

  async dispatch(event: IngestionEvent): Promise<void> {
    const specificHandlers = this.handlers.get(event.result) ?? new Set();
    const allHandlers = [...specificHandlers, ...this.globalHandlers];

    const outcomes = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(event)),
    );

    for (const [index, outcome] of outcomes.entries()) {
      if (outcome.status === 'rejected') {
        const reason =
          outcome.reason instanceof Error
            ? outcome.reason.message
            : String(outcome.reason);
        this.logger.warn(
          `Handler ${allHandlers[index].name || 'anonymous'} failed for ${event.result}: ${reason}`,
        );
      }
    }
  }

  /**
   * Number of registered handlers, across all result classes
   */
  getHandlerCount(): number {
    let count = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      count += handlers.size;
    }
    return count;
  }
}
