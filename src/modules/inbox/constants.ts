/**
 * Injection tokens for the inbox module
 */

export const MESSAGE_STORE = Symbol('MESSAGE_STORE');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const METRICS_HANDLER = Symbol('METRICS_HANDLER');
export const SIGNATURE_VERIFIER = Symbol('SIGNATURE_VERIFIER');
export const INBOX_CONFIG = Symbol('INBOX_CONFIG');
export const INGESTION_HANDLER = Symbol('INGESTION_HANDLER');
export const MESSAGE_QUERY_SERVICE = Symbol('MESSAGE_QUERY_SERVICE');

export const DEFAULT_SIGNATURE_HEADER = 'x-signature';
