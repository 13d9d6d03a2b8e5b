/**
 * Message domain model - the single persisted entity
 *
 * Rows are written once and never updated, so every field is readonly.
 * Stores hand out fresh instances; a Message never aliases stored state.
 */
export class Message {
  constructor(
    public readonly messageId: string,
    public readonly fromAddress: string,
    public readonly toAddress: string,
    public readonly timestamp: string,
    public readonly text: string | null,
    public readonly receivedAt: string,
  ) {
    Object.freeze(this);
  }

  /**
   * Compare the caller-supplied fields of two messages (receivedAt excluded)
   */
  hasSameContent(other: Message): boolean {
    return (
      this.messageId === other.messageId &&
      this.fromAddress === other.fromAddress &&
      this.toAddress === other.toAddress &&
      this.timestamp === other.timestamp &&
      this.text === other.text
    );
  }
}
