import { Message } from '../domain/models';
import {
  InsertResult,
  MessageFilter,
  MessageListResult,
  MessageStats,
} from './common.types';

/**
 * Storage port for messages
 *
 * Implementations MUST enforce uniqueness of messageId atomically at the
 * storage layer. insertIfAbsent relies on that constraint instead of an
 * in-process lock: under concurrent calls with one id, exactly one caller
 * sees wasNew = true.
 */
export interface MessageStore {
  /**
   * Insert unless the id exists. On conflict the stored row is returned
   * unchanged (first write wins).
   */
  insertIfAbsent(message: Message): Promise<InsertResult>;

  /**
   * Find a message by id
   */
  findById(messageId: string): Promise<Message | null>;

  /**
   * Filtered page ordered by timestamp then messageId, both ascending.
   * total counts the filtered set before pagination.
   */
  list(filter: MessageFilter): Promise<MessageListResult>;

  /**
   * Aggregates over the full, unfiltered set
   */
  stats(): Promise<MessageStats>;

  /**
   * Check if storage is reachable
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release connections; called once on application shutdown
   */
  close(): Promise<void>;
}
