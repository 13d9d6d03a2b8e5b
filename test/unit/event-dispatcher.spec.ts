import {
  EventDispatcherImpl,
  IngestionEvent,
  IngestionResult,
  LoggingEventHandler,
} from '../../src';
import { Logger } from '@nestjs/common';

const event = (result: IngestionResult, messageId?: string): IngestionEvent =>
  Object.freeze({
    result,
    latencyMs: 3.14159,
    messageId,
    occurredAt: new Date('2025-01-15T10:00:00Z'),
  });

describe('EventDispatcherImpl', () => {
  let dispatcher: EventDispatcherImpl;

  beforeEach(() => {
    dispatcher = new EventDispatcherImpl();
  });

  it('should deliver to handlers of the matching result and to global handlers', async () => {
    const created = jest.fn();
    const duplicate = jest.fn();
    const all = jest.fn();

    dispatcher.on(IngestionResult.CREATED, created);
    dispatcher.on(IngestionResult.DUPLICATE, duplicate);
    dispatcher.onAll(all);

    const dispatched = event(IngestionResult.CREATED, 'm1');
    await dispatcher.dispatch(dispatched);

    expect(created).toHaveBeenCalledWith(dispatched);
    expect(duplicate).not.toHaveBeenCalled();
    expect(all).toHaveBeenCalledTimes(1);
  });

  it('should isolate a failing handler from the others and the caller', async () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const healthy = jest.fn();

    dispatcher.onAll(async () => {
      throw new Error('sink down');
    });
    dispatcher.onAll(healthy);

    await expect(
      dispatcher.dispatch(event(IngestionResult.CREATED)),
    ).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);

    warn.mockRestore();
  });

  it('should stop delivering after unsubscribe and off', async () => {
    const specific = jest.fn();
    const global = jest.fn();

    dispatcher.on(IngestionResult.CREATED, specific);
    const subscription = dispatcher.onAll(global);
    expect(dispatcher.getHandlerCount()).toBe(2);

    dispatcher.off(IngestionResult.CREATED, specific);
    subscription.unsubscribe();
    await dispatcher.dispatch(event(IngestionResult.CREATED));

    expect(specific).not.toHaveBeenCalled();
    expect(global).not.toHaveBeenCalled();
    expect(dispatcher.getHandlerCount()).toBe(0);
  });

  it('should remove handlers for one result or all of them', () => {
    dispatcher.on(IngestionResult.CREATED, jest.fn());
    dispatcher.on(IngestionResult.DUPLICATE, jest.fn());
    dispatcher.onAll(jest.fn());

    dispatcher.removeAllHandlers(IngestionResult.CREATED);
    expect(dispatcher.getHandlerCount()).toBe(2);

    dispatcher.removeAllHandlers();
    expect(dispatcher.getHandlerCount()).toBe(0);
  });
});

describe('LoggingEventHandler', () => {
  it('should log internal errors at warn and other results at debug', () => {
    const logger = new Logger('test');
    const warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const debug = jest.spyOn(logger, 'debug').mockImplementation(() => undefined);
    const handler = new LoggingEventHandler(logger).getHandler();

    void handler(event(IngestionResult.CREATED, 'm1'));
    void handler(event(IngestionResult.INTERNAL_ERROR));

    expect(debug).toHaveBeenCalledWith(
      '{"result":"created","message_id":"m1","latency_ms":3.14,"ts":"2025-01-15T10:00:00.000Z"}',
    );
    expect(warn).toHaveBeenCalledWith(
      '{"result":"internal_error","latency_ms":3.14,"ts":"2025-01-15T10:00:00.000Z"}',
    );
  });
});
