import { Message } from '../domain/models';

/**
 * Common types used across the core and its adapters
 */

/**
 * One failed field in a payload or query, with every violated constraint
 */
export interface FieldError {
  field: string;
  messages: string[];
}

/**
 * Normalized list filter handed to a MessageStore
 */
export interface MessageFilter {
  /** Exact sender match */
  fromAddress?: string;

  /** Inclusive lower bound, compared as a string */
  sinceTimestamp?: string;

  /** Case-insensitive literal substring of the text */
  textContains?: string;

  limit: number;
  offset: number;
}

/**
 * A page of messages plus the size of the whole filtered set
 */
export interface MessageListResult {
  items: Message[];
  total: number;
}

export interface SenderCount {
  sender: string;
  count: number;
}

/**
 * Aggregates over every stored message
 */
export interface MessageStats {
  totalMessages: number;
  distinctSenderCount: number;
  topSenders: SenderCount[];
  earliestTimestamp: string | null;
  latestTimestamp: string | null;
}

export interface InsertResult {
  message: Message;
  wasNew: boolean;
}

/**
 * Response envelope for paginated listing
 */
export interface MessagePage {
  data: Message[];
  total: number;
  limit: number;
  offset: number;
}

export const MAX_TOP_SENDERS = 10;
