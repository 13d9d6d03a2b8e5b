import { InboxModule, MockStorageAdapter } from '../../src';

describe('InboxModule', () => {
  it('should close the message store on application shutdown', async () => {
    const store = new MockStorageAdapter();
    const close = jest.spyOn(store, 'close');

    await new InboxModule(store).onApplicationShutdown();

    expect(close).toHaveBeenCalledTimes(1);
    expect(await store.isHealthy()).toBe(false);
  });

  it('should register the configured store under the forRoot providers', () => {
    const module = InboxModule.forRoot({
      storage: { type: 'mock' },
      webhook: { secret: 'test-secret' },
    });

    expect(module.module).toBe(InboxModule);
    expect(module.controllers).toHaveLength(4);
  });
});
