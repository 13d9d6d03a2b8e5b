export * from './ingestion-outcome.enum';
