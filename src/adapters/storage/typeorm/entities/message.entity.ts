import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for Message
 *
 * The primary key on message_id is the uniqueness constraint that makes
 * insertIfAbsent atomic.
 */
@Entity('messages')
@Index(['fromAddress'])
@Index(['timestamp', 'messageId'])
export class MessageEntity {
  @PrimaryColumn({ type: 'varchar', name: 'message_id' })
  messageId!: string;

  @Column({ type: 'varchar', name: 'from_address' })
  fromAddress!: string;

  @Column({ type: 'varchar', name: 'to_address' })
  toAddress!: string;

  // ISO-8601 UTC string, compared lexically
  @Column({ type: 'varchar', name: 'ts' })
  timestamp!: string;

  @Column({ type: 'text', nullable: true })
  text!: string | null;

  @Column({ type: 'varchar', name: 'received_at' })
  receivedAt!: string;
}
