import {
  InvalidQueryError,
  Message,
  MessageQueryService,
  MockStorageAdapter,
} from '../../src';

describe('MessageQueryService', () => {
  let store: MockStorageAdapter;
  let service: MessageQueryService;

  beforeEach(async () => {
    store = new MockStorageAdapter();
    service = new MessageQueryService(store);

    for (let i = 0; i < 3; i++) {
      await store.insertIfAbsent(
        new Message(
          `m${i}`,
          i === 2 ? '+2000' : '+1000',
          '+14155550100',
          `2025-01-15T10:0${i}:00Z`,
          i === 1 ? 'Hello there' : 'bye',
          '2025-01-15T12:00:00.000Z',
        ),
      );
    }
  });

  const captureError = async (query: Record<string, unknown>): Promise<InvalidQueryError> => {
    try {
      await service.listMessages(query);
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        return error;
      }
      throw error;
    }
    throw new Error('expected listMessages to reject');
  };

  describe('listMessages', () => {
    it('should apply default pagination', async () => {
      const page = await service.listMessages();

      expect(page.limit).toBe(50);
      expect(page.offset).toBe(0);
      expect(page.total).toBe(3);
      expect(page.data.map((m) => m.messageId)).toEqual(['m0', 'm1', 'm2']);
    });

    it('should parse string parameters from the query string', async () => {
      const page = await service.listMessages({ limit: '1', offset: '1' });

      expect(page).toMatchObject({ limit: 1, offset: 1, total: 3 });
      expect(page.data.map((m) => m.messageId)).toEqual(['m1']);
    });

    it('should pass filters through to the store', async () => {
      const bySender = await service.listMessages({ from: '+2000' });
      expect(bySender.data.map((m) => m.messageId)).toEqual(['m2']);

      const bySince = await service.listMessages({ since: '2025-01-15T10:01:00Z' });
      expect(bySince.data.map((m) => m.messageId)).toEqual(['m1', 'm2']);

      const byText = await service.listMessages({ q: 'hello' });
      expect(byText.data.map((m) => m.messageId)).toEqual(['m1']);
    });

    it('should treat empty filter strings as absent', async () => {
      const page = await service.listMessages({ from: '', since: '', q: '' });

      expect(page.total).toBe(3);
    });

    it('should accept the limit bounds', async () => {
      expect((await service.listMessages({ limit: '1' })).limit).toBe(1);
      expect((await service.listMessages({ limit: '100' })).limit).toBe(100);
    });

    it('should reject a limit outside 1..100', async () => {
      expect((await captureError({ limit: '0' })).errors).toEqual([
        { field: 'limit', messages: ['limit must not be less than 1'] },
      ]);
      expect((await captureError({ limit: '101' })).errors).toEqual([
        { field: 'limit', messages: ['limit must not be greater than 100'] },
      ]);
    });

    it('should reject a negative or non-integer offset', async () => {
      expect((await captureError({ offset: '-1' })).errors).toEqual([
        { field: 'offset', messages: ['offset must not be less than 0'] },
      ]);
      expect((await captureError({ offset: 'abc' })).errors.map((e) => e.field)).toEqual([
        'offset',
      ]);
    });

    it('should not query the store when parameters are invalid', async () => {
      const list = jest.spyOn(store, 'list');

      await expect(service.listMessages({ limit: '1000' })).rejects.toThrow(
        InvalidQueryError,
      );
      expect(list).not.toHaveBeenCalled();
    });
  });

  describe('getStats', () => {
    it('should return the store statistics', async () => {
      expect(await service.getStats()).toEqual({
        totalMessages: 3,
        distinctSenderCount: 2,
        topSenders: [
          { sender: '+1000', count: 2 },
          { sender: '+2000', count: 1 },
        ],
        earliestTimestamp: '2025-01-15T10:00:00Z',
        latestTimestamp: '2025-01-15T10:02:00Z',
      });
    });
  });
});
