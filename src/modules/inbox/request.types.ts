import type { Request } from 'express';

/**
 * Fields a handler adds to the access-log line
 */
export interface RequestLogContext {
  message_id?: string;
  dup?: boolean;
  result?: string;
}

/**
 * Anything a controller can attach log fields to
 */
export interface RequestLogCarrier {
  logContext?: RequestLogContext;
}

/**
 * Express request as seen by the inbox interceptors
 */
export interface InboxRequest extends Request, RequestLogCarrier {
  rawBody?: Buffer;
  requestId?: string;
}
