import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  IngestionContext,
  IngestionOutcome,
  PipelineConfig,
  PipelineError,
  PipelineStage,
  StageResult,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { ValidationStage } from './stages/validation.stage';
import { PersistStage } from './stages/persist.stage';
import {
  IngestionOutcomeKind,
  IngestionResult,
  OUTCOME_RESULTS,
} from '../domain/enums';
import { HmacSignatureVerifier } from '../verification';

/**
 * IngestionHandler runs one inbound webhook through the pipeline
 *
 * Pipeline stages:
 * 1. Verification - shared-secret HMAC over the raw bytes
 * 2. Validation - parse and check the payload
 * 3. Persist - idempotent insert
 *
 * Each call reports exactly one event to the dispatcher, whichever branch
 * ends it. Storage failures are reported as internal errors and rethrown.
 */
export class IngestionHandler {
  private readonly logger = new Logger(IngestionHandler.name);
  private readonly stages: PipelineStage[];

  constructor(private readonly config: PipelineConfig) {
    this.stages = [
      new VerificationStage(
        config.verifier ?? new HmacSignatureVerifier(),
        config.secret,
      ),
      new ValidationStage(),
      new PersistStage(config.store, config.clock ?? (() => new Date())),
    ];
  }

  /**
   * Whether a shared secret is available to authenticate requests
   */
  isConfigured(): boolean {
    return Boolean(this.config.secret);
  }

  async ingest(rawBody: Buffer, signature?: string): Promise<IngestionOutcome> {
    const startTime = performance.now();

    const context: IngestionContext = {
      rawBody,
      signature,
      processingId: uuidv4(),
      startedAt: new Date(),
    };

    let outcome: IngestionOutcome;
    try {
      outcome = await this.executePipeline(context);
    } catch (error) {
      this.logger.error(
        `Ingestion ${context.processingId} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      await this.report(
        IngestionResult.INTERNAL_ERROR,
        startTime,
        context.payload?.message_id,
      );
      throw error;
    }

    await this.report(
      OUTCOME_RESULTS[outcome.kind],
      startTime,
      this.messageIdOf(outcome),
    );

    return outcome;
  }

  /**
   * Execute the pipeline stages sequentially until one settles the outcome
   */
  private async executePipeline(
    context: IngestionContext,
  ): Promise<IngestionOutcome> {
    for (const stage of this.stages) {
      let result: StageResult;
      try {
        result = await stage.execute(context);
      } catch (error) {
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }

      if (!result.shouldContinue) {
        break;
      }
    }

    if (!context.outcome) {
      throw new PipelineError(
        'Pipeline finished without an outcome',
        'pipeline',
        context,
      );
    }

    return context.outcome;
  }

  private async report(
    result: IngestionResult,
    startTime: number,
    messageId?: string,
  ): Promise<void> {
    if (!this.config.eventDispatcher) {
      return;
    }

    await this.config.eventDispatcher.dispatch(
      Object.freeze({
        result,
        latencyMs: performance.now() - startTime,
        messageId,
        occurredAt: new Date(),
      }),
    );
  }

  private messageIdOf(outcome: IngestionOutcome): string | undefined {
    switch (outcome.kind) {
      case IngestionOutcomeKind.CREATED:
      case IngestionOutcomeKind.DUPLICATE:
        return outcome.message.messageId;
      default:
        return undefined;
    }
  }
}
