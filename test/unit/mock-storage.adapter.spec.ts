import { Message, MockStorageAdapter } from '../../src';

const message = (messageId: string, text: string): Message =>
  new Message(
    messageId,
    '+1000',
    '+2000',
    '2025-01-15T10:00:00Z',
    text,
    '2025-01-15T10:00:01.000Z',
  );

describe('MockStorageAdapter', () => {
  it('should stay atomic with simulated latency', async () => {
    const store = new MockStorageAdapter({ simulateLatency: true, latencyMs: 5 });

    const results = await Promise.all([
      store.insertIfAbsent(message('m1', 'a')),
      store.insertIfAbsent(message('m1', 'b')),
      store.insertIfAbsent(message('m1', 'c')),
    ]);

    expect(results.map((r) => r.wasNew)).toEqual([true, false, false]);
    expect(results.map((r) => r.message.text)).toEqual(['a', 'a', 'a']);
    expect(store.size()).toBe(1);
  });

  it('should hand out copies that do not alias stored state', async () => {
    const store = new MockStorageAdapter();
    const { message: first } = await store.insertIfAbsent(message('m1', 'a'));
    const found = await store.findById('m1');

    expect(found).not.toBe(first);
    expect(Object.isFrozen(found)).toBe(true);
  });

  it('should report configured health', async () => {
    const store = new MockStorageAdapter({ healthy: false });
    expect(await store.isHealthy()).toBe(false);

    store.setHealthy(true);
    expect(await store.isHealthy()).toBe(true);
  });

  it('should report unhealthy once closed', async () => {
    const store = new MockStorageAdapter();

    await store.close();

    expect(await store.isHealthy()).toBe(false);
  });
});
