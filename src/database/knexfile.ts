import type { Knex } from 'knex';
import { config } from '../config';
import { migrationSource } from './migrations';

interface SqliteConnection {
  pragma(source: string): unknown;
}

const postgresConnection = {
  host: config.database.host,
  port: config.database.port,
  database: config.database.database,
  user: config.database.user,
  password: config.database.password,
};

const knexConfig: { [key: string]: Knex.Config } = {
  development: {
    client: 'pg',
    connection: postgresConnection,
    pool: {
      min: 2,
      max: 10,
    },
    migrations: {
      tableName: 'knex_migrations',
      migrationSource,
    },
  },

  production: {
    client: 'pg',
    connection: postgresConnection,
    pool: {
      min: 2,
      max: 20,
    },
    migrations: {
      tableName: 'knex_migrations',
      migrationSource,
    },
  },

  // In-memory SQLite: one connection, so the pool must never recycle it.
  test: {
    client: 'better-sqlite3',
    connection: {
      filename: ':memory:',
    },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      idleTimeoutMillis: 24 * 60 * 60 * 1000,
      afterCreate: (conn: SqliteConnection, done: (err: Error | null, conn: SqliteConnection) => void) => {
        conn.pragma('foreign_keys = ON');
        done(null, conn);
      },
    },
    migrations: {
      tableName: 'knex_migrations',
      migrationSource,
    },
  },
};

export default knexConfig;
