import { Message } from '../domain/models';
import { IngestionOutcomeKind } from '../domain/enums';
import {
  EventDispatcher,
  FieldError,
  MessageStore,
  SignatureVerifier,
} from '../interfaces';
import { WebhookPayloadDto } from '../../_shared/dto/webhook.dto';

/**
 * Result of one ingestion call
 */
export type IngestionOutcome =
  | { kind: IngestionOutcomeKind.UNCONFIGURED }
  | { kind: IngestionOutcomeKind.MISSING_SIGNATURE }
  | { kind: IngestionOutcomeKind.INVALID_SIGNATURE }
  | { kind: IngestionOutcomeKind.VALIDATION_ERROR; errors: FieldError[] }
  | { kind: IngestionOutcomeKind.CREATED; message: Message }
  | { kind: IngestionOutcomeKind.DUPLICATE; message: Message };

/**
 * Ingestion context passed through the pipeline
 */
export interface IngestionContext {
  // Raw input, untouched until verification has passed
  rawBody: Buffer;
  signature?: string;

  processingId: string;
  startedAt: Date;

  // Set by validation
  payload?: WebhookPayloadDto;

  // Set by whichever stage ends the call
  outcome?: IngestionOutcome;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  context: IngestionContext;
  shouldContinue: boolean;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: IngestionContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  store: MessageStore;

  /**
   * Shared secret; empty or undefined means the service is unconfigured
   */
  secret?: string;

  verifier?: SignatureVerifier;
  eventDispatcher?: EventDispatcher;

  /**
   * Source of receivedAt; replaceable in tests
   */
  clock?: () => Date;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: IngestionContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
