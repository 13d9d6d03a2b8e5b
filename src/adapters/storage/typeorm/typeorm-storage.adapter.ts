import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { BetterSqlite3Driver } from 'typeorm/driver/better-sqlite3/BetterSqlite3Driver';
import {
  MessageStore,
  Message,
  InsertResult,
  MessageFilter,
  MessageListResult,
  MessageStats,
  MAX_TOP_SENDERS,
} from '../../../core';
import { MessageEntity } from './entities';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
  'ER_DUP_ENTRY',
]);

/**
 * Whether a query failed on a uniqueness constraint
 */
export const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) {
    return false;
  }

  const code = 'code' in driverError ? driverError.code : undefined;
  return typeof code === 'string' && UNIQUE_VIOLATION_CODES.has(code);
};

/**
 * Escape LIKE wildcards so user input matches literally
 */
const escapeLike = (value: string): string => value.replace(/[\\%_]/g, '\\$&');

const UNICODE_LOWER_FUNCTION = 'unicode_lower';

interface StatsRow {
  total: string | number;
  senders: string | number;
  earliest: string | null;
  latest: string | null;
}

interface SenderRow {
  sender: string;
  message_count: string | number;
}

/**
 * TypeORM implementation of MessageStore for PostgreSQL and SQLite
 */
export class TypeORMStorageAdapter implements MessageStore {
  private messageRepo: Repository<MessageEntity>;
  private readonly lowerFunction: string;

  /**
   * Expects an initialized DataSource. On SQLite, whose LOWER() folds ASCII
   * only, a Unicode-aware lowering function is registered on the connection.
   */
  constructor(private readonly dataSource: DataSource) {
    this.messageRepo = dataSource.getRepository(MessageEntity);
    this.lowerFunction = 'LOWER';

    if (dataSource.driver instanceof BetterSqlite3Driver) {
      dataSource.driver.databaseConnection.function(
        UNICODE_LOWER_FUNCTION,
        { deterministic: true },
        (value: unknown) => (typeof value === 'string' ? value.toLowerCase() : value),
      );
      this.lowerFunction = UNICODE_LOWER_FUNCTION;
    }
  }

  /**
   * Attempt the insert unconditionally and let the primary key reject a
   * second writer; the loser re-reads the winning row. No read-then-write
   * window exists because the database enforces uniqueness atomically.
   */
  async insertIfAbsent(message: Message): Promise<InsertResult> {
    const entity = this.messageRepo.create({
      messageId: message.messageId,
      fromAddress: message.fromAddress,
      toAddress: message.toAddress,
      timestamp: message.timestamp,
      text: message.text,
      receivedAt: message.receivedAt,
    });

    try {
      await this.messageRepo.insert(entity);
      return { message: this.mapEntityToDomain(entity), wasNew: true };
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    const existing = await this.messageRepo.findOne({
      where: { messageId: message.messageId },
    });

    if (!existing) {
      throw new Error(
        `Message ${message.messageId} conflicted on insert but could not be read back`,
      );
    }

    return { message: this.mapEntityToDomain(existing), wasNew: false };
  }

  async findById(messageId: string): Promise<Message | null> {
    const entity = await this.messageRepo.findOne({ where: { messageId } });
    return entity ? this.mapEntityToDomain(entity) : null;
  }

  async list(filter: MessageFilter): Promise<MessageListResult> {
    const qb = this.messageRepo.createQueryBuilder('m');

    if (filter.fromAddress) {
      qb.andWhere('m.fromAddress = :fromAddress', {
        fromAddress: filter.fromAddress,
      });
    }
    if (filter.sinceTimestamp) {
      qb.andWhere('m.timestamp >= :since', { since: filter.sinceTimestamp });
    }
    if (filter.textContains) {
      qb.andWhere(`${this.lowerFunction}(m.text) LIKE :pattern ESCAPE '\\'`, {
        pattern: `%${escapeLike(filter.textContains.toLowerCase())}%`,
      });
    }

    const total = await qb.getCount();

    qb.orderBy('m.timestamp', 'ASC');
    qb.addOrderBy('m.messageId', 'ASC');
    qb.offset(filter.offset);
    qb.limit(filter.limit);

    const entities = await qb.getMany();

    return {
      items: entities.map((e) => this.mapEntityToDomain(e)),
      total,
    };
  }

  async stats(): Promise<MessageStats> {
    const totals = await this.messageRepo
      .createQueryBuilder('m')
      .select('COUNT(*)', 'total')
      .addSelect('COUNT(DISTINCT m.fromAddress)', 'senders')
      .addSelect('MIN(m.timestamp)', 'earliest')
      .addSelect('MAX(m.timestamp)', 'latest')
      .getRawOne<StatsRow>();

    const senders = await this.messageRepo
      .createQueryBuilder('m')
      .select('m.fromAddress', 'sender')
      .addSelect('COUNT(*)', 'message_count')
      .groupBy('m.fromAddress')
      .orderBy('message_count', 'DESC')
      .addOrderBy('m.fromAddress', 'ASC')
      .limit(MAX_TOP_SENDERS)
      .getRawMany<SenderRow>();

    return {
      // COUNT comes back as a string from pg (bigint) and a number from sqlite
      totalMessages: Number(totals?.total ?? 0),
      distinctSenderCount: Number(totals?.senders ?? 0),
      topSenders: senders.map((row) => ({
        sender: row.sender,
        count: Number(row.message_count),
      })),
      earliestTimestamp: totals?.earliest ?? null,
      latestTimestamp: totals?.latest ?? null,
    };
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  private mapEntityToDomain(entity: MessageEntity): Message {
    return new Message(
      entity.messageId,
      entity.fromAddress,
      entity.toAddress,
      entity.timestamp,
      entity.text ?? null,
      entity.receivedAt,
    );
  }
}
