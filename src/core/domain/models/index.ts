export * from './message.model';
