import { DataSource, DataSourceOptions } from 'typeorm';
import { MessageEntity } from './entities';

export const DEFAULT_DATABASE_URL = 'sqlite:////data/app.db';

/**
 * Map a database URL onto driver options.
 *
 * `sqlite:///relative.db` and `sqlite:////absolute/path.db` select
 * better-sqlite3; `sqlite://` or `sqlite:///:memory:` an in-memory
 * database. `postgres://` and `postgresql://` URLs go to pg as is.
 */
export const parseDatabaseUrl = (databaseUrl: string): DataSourceOptions => {
  if (databaseUrl.startsWith('sqlite:')) {
    const path = databaseUrl.replace(/^sqlite:(\/\/\/?)?/, '');
    return {
      type: 'better-sqlite3',
      database: path === '' || path === ':memory:' ? ':memory:' : path,
    };
  }

  if (/^postgres(ql)?:\/\//.test(databaseUrl)) {
    return {
      type: 'postgres',
      url: databaseUrl,
      extra: {
        max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      },
    };
  }

  throw new Error(`Unsupported DATABASE_URL scheme: ${databaseUrl.split(':')[0]}`);
};

/**
 * TypeORM configuration for the message store.
 * synchronize creates the table on first start; there are no migrations.
 */
export const createTypeORMConfig = (
  databaseUrl: string = DEFAULT_DATABASE_URL,
  options: Partial<DataSourceOptions> = {},
): DataSourceOptions => {
  const base = parseDatabaseUrl(databaseUrl);
  // Spread widens the driver union; driver-specific keys come from base
  return {
    ...base,
    entities: [MessageEntity],
    synchronize: true,
    logging: process.env.DB_LOGGING === 'true',
    ...options,
  } as DataSourceOptions;
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  databaseUrl?: string,
  options?: Partial<DataSourceOptions>,
): DataSource => {
  return new DataSource(createTypeORMConfig(databaseUrl, options));
};
