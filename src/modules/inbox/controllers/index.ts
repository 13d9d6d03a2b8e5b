export { WebhookController } from './webhook.controller';
export { MessageController } from './message.controller';
export { HealthController } from './health.controller';
export { MetricsController } from './metrics.controller';
