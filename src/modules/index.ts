/**
 * Webhook Inbox - NestJS integration
 */

export * from './inbox';
