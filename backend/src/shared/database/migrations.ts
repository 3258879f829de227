import { ensurePostgresConnection, type SqlExecutor } from './postgres.client.js';

export const COLLECTION_RECORDS_TABLE = 'collection_records';

const createTables = async (executor: SqlExecutor) => {
  await executor.query(`
    CREATE TABLE IF NOT EXISTS ${COLLECTION_RECORDS_TABLE} (
      seq BIGSERIAL NOT NULL,
      collection TEXT NOT NULL,
      id TEXT NOT NULL,
      payload JSONB NOT NULL,
      PRIMARY KEY (collection, id)
    );
  `);

  await executor.query(`
    CREATE INDEX IF NOT EXISTS ${COLLECTION_RECORDS_TABLE}_collection_seq_idx
      ON ${COLLECTION_RECORDS_TABLE} (collection, seq);
  `);
};

export const runMigrations = async (executor: SqlExecutor) => {
  await ensurePostgresConnection(executor, { logger: console.log });
  // Migrations run sequentially during server startup
  await createTables(executor);
};
