import { PipelineStage, IngestionContext, StageResult } from '../types';
import { IngestionOutcomeKind } from '../../domain/enums';
import { Message } from '../../domain/models';
import { MessageStore } from '../../interfaces';

/**
 * Stage 3: Persist
 * Idempotent insert keyed by message_id; the first stored row wins
 */
export class PersistStage implements PipelineStage {
  name = 'persist';

  constructor(
    private readonly store: MessageStore,
    private readonly clock: () => Date,
  ) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const payload = context.payload;
    if (!payload) {
      throw new Error('No validated payload to persist');
    }

    const candidate = new Message(
      payload.message_id,
      payload.from,
      payload.to,
      payload.ts,
      payload.text ?? null,
      this.clock().toISOString(),
    );

    // Resubmitted fields are discarded on conflict, even when they differ
    const { message, wasNew } = await this.store.insertIfAbsent(candidate);

    context.outcome = wasNew
      ? { kind: IngestionOutcomeKind.CREATED, message }
      : { kind: IngestionOutcomeKind.DUPLICATE, message };

    return { context, shouldContinue: false };
  }
}
