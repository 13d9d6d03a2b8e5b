import { PipelineStage, IngestionContext, StageResult } from '../types';
import { IngestionOutcomeKind } from '../../domain/enums';
import { SignatureVerifier } from '../../interfaces';

/**
 * Stage 1: Signature Verification
 * Authenticates the raw body before anything parses it
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(
    private readonly verifier: SignatureVerifier,
    private readonly secret?: string,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    if (!this.secret) {
      context.outcome = { kind: IngestionOutcomeKind.UNCONFIGURED };
      return { context, shouldContinue: false };
    }

    if (!context.signature) {
      context.outcome = { kind: IngestionOutcomeKind.MISSING_SIGNATURE };
      return { context, shouldContinue: false };
    }

    const isValid = this.verifier.verify(
      this.secret,
      context.rawBody,
      context.signature,
    );

    if (!isValid) {
      context.outcome = { kind: IngestionOutcomeKind.INVALID_SIGNATURE };
      return { context, shouldContinue: false };
    }

    return { context, shouldContinue: true };
  }
}
