/**
 * Centralized DTOs for the inbox API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './validators';
export * from './webhook.dto';
export * from './message.dto';
