// Interface and type exports
export * from './common.types';
export * from './message-store.interface';
export * from './signature-verifier.interface';
export * from './event-dispatcher.interface';
