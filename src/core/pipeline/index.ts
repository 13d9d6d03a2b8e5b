export * from './types';
export * from './ingestion-handler';
export { VerificationStage } from './stages/verification.stage';
export { ValidationStage } from './stages/validation.stage';
export { PersistStage } from './stages/persist.stage';
