export * from './timestamp';
export * from './validation';
