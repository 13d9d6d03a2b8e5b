/**
 * Every ingestion call ends in exactly one of these outcomes
 */
export enum IngestionOutcomeKind {
  /**
   * No shared secret configured; the service cannot authenticate anything
   */
  UNCONFIGURED = 'unconfigured',

  /**
   * Signature header absent or empty
   */
  MISSING_SIGNATURE = 'missing_signature',

  /**
   * Signature header present but does not match the body
   */
  INVALID_SIGNATURE = 'invalid_signature',

  /**
   * Authentic body that fails payload validation
   */
  VALIDATION_ERROR = 'validation_error',

  /**
   * First delivery of a message id; row written
   */
  CREATED = 'created',

  /**
   * Message id already stored; first write kept
   */
  DUPLICATE = 'duplicate',
}

/**
 * Classification reported to the event sink, one per ingestion call.
 * Missing and invalid signatures share a class so counters never
 * distinguish them.
 */
export enum IngestionResult {
  UNCONFIGURED = 'unconfigured',
  INVALID_SIGNATURE = 'invalid_signature',
  VALIDATION_ERROR = 'validation_error',
  CREATED = 'created',
  DUPLICATE = 'duplicate',
  INTERNAL_ERROR = 'internal_error',
}

export const OUTCOME_RESULTS: Record<IngestionOutcomeKind, IngestionResult> = {
  [IngestionOutcomeKind.UNCONFIGURED]: IngestionResult.UNCONFIGURED,
  [IngestionOutcomeKind.MISSING_SIGNATURE]: IngestionResult.INVALID_SIGNATURE,
  [IngestionOutcomeKind.INVALID_SIGNATURE]: IngestionResult.INVALID_SIGNATURE,
  [IngestionOutcomeKind.VALIDATION_ERROR]: IngestionResult.VALIDATION_ERROR,
  [IngestionOutcomeKind.CREATED]: IngestionResult.CREATED,
  [IngestionOutcomeKind.DUPLICATE]: IngestionResult.DUPLICATE,
};
