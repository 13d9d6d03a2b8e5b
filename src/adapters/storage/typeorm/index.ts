/**
 * TypeORM Storage Adapter for PostgreSQL and SQLite
 */

export { TypeORMStorageAdapter, isUniqueViolation } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  parseDatabaseUrl,
  DEFAULT_DATABASE_URL,
} from './typeorm.config';
export * from './entities';
