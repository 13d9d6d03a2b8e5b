import {
  MessageStore,
  Message,
  InsertResult,
  MessageFilter,
  MessageListResult,
  MessageStats,
  SenderCount,
  MAX_TOP_SENDERS,
} from '../../../core';

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  healthy?: boolean;
}

interface MessageRecord {
  messageId: string;
  fromAddress: string;
  toAddress: string;
  timestamp: string;
  text: string | null;
  receivedAt: string;
}

/**
 * Mock storage adapter for testing and local runs
 *
 * In-memory storage with deterministic behavior. insertIfAbsent checks and
 * writes without yielding in between, which makes it atomic on the single
 * event-loop thread; latency is simulated before the check, never inside it.
 */
export class MockStorageAdapter implements MessageStore {
  private messages: Map<string, MessageRecord> = new Map();
  private readonly options: MockStorageOptions;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      healthy: true,
      ...options,
    };
  }

  /**
   * Simulate storage latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  async insertIfAbsent(message: Message): Promise<InsertResult> {
    await this.simulateLatency();

    const existing = this.messages.get(message.messageId);
    if (existing) {
      return { message: this.toDomain(existing), wasNew: false };
    }

    const record: MessageRecord = {
      messageId: message.messageId,
      fromAddress: message.fromAddress,
      toAddress: message.toAddress,
      timestamp: message.timestamp,
      text: message.text,
      receivedAt: message.receivedAt,
    };
    this.messages.set(record.messageId, record);

    return { message: this.toDomain(record), wasNew: true };
  }

  async findById(messageId: string): Promise<Message | null> {
    await this.simulateLatency();

    const record = this.messages.get(messageId);
    return record ? this.toDomain(record) : null;
  }

  async list(filter: MessageFilter): Promise<MessageListResult> {
    await this.simulateLatency();

    const needle = filter.textContains?.toLowerCase();

    const matching = Array.from(this.messages.values())
      .filter((m) => !filter.fromAddress || m.fromAddress === filter.fromAddress)
      .filter(
        (m) => !filter.sinceTimestamp || m.timestamp >= filter.sinceTimestamp,
      )
      .filter(
        (m) =>
          needle === undefined ||
          (m.text !== null && m.text.toLowerCase().includes(needle)),
      )
      .sort(
        (a, b) =>
          this.compare(a.timestamp, b.timestamp) ||
          this.compare(a.messageId, b.messageId),
      );

    return {
      items: matching
        .slice(filter.offset, filter.offset + filter.limit)
        .map((record) => this.toDomain(record)),
      total: matching.length,
    };
  }

  async stats(): Promise<MessageStats> {
    await this.simulateLatency();

    const records = Array.from(this.messages.values());
    const perSender = new Map<string, number>();
    for (const record of records) {
      perSender.set(record.fromAddress, (perSender.get(record.fromAddress) ?? 0) + 1);
    }

    const topSenders: SenderCount[] = Array.from(perSender, ([sender, count]) => ({
      sender,
      count,
    }))
      .sort((a, b) => b.count - a.count || this.compare(a.sender, b.sender))
      .slice(0, MAX_TOP_SENDERS);

    const timestamps = records.map((r) => r.timestamp).sort();

    return {
      totalMessages: records.length,
      distinctSenderCount: perSender.size,
      topSenders,
      earliestTimestamp: timestamps.length > 0 ? timestamps[0] : null,
      latestTimestamp:
        timestamps.length > 0 ? timestamps[timestamps.length - 1] : null,
    };
  }

  async isHealthy(): Promise<boolean> {
    return this.options.healthy !== false;
  }

  async close(): Promise<void> {
    this.options.healthy = false;
  }

  /**
   * Toggle the reported health (for readiness tests)
   */
  setHealthy(healthy: boolean): void {
    this.options.healthy = healthy;
  }

  /**
   * Clear all stored messages
   */
  clear(): void {
    this.messages.clear();
  }

  /**
   * Number of stored messages
   */
  size(): number {
    return this.messages.size;
  }

  private compare(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  private toDomain(record: MessageRecord): Message {
    return new Message(
      record.messageId,
      record.fromAddress,
      record.toAddress,
      record.timestamp,
      record.text,
      record.receivedAt,
    );
  }
}
