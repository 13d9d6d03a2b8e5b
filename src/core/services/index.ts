export * from './message-query.service';
