import { Pool, type PoolConfig } from 'pg';

type EnsureConnectionOptions = {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: (message: string) => void;
};

export interface SqlQueryResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

// The subset of pg.Pool the storage layer talks to
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
}

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const readNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

export const buildPoolConfig = (env: NodeJS.ProcessEnv = process.env): PoolConfig => {
  const connectionTimeoutMillis = readNumber(env.PG_CONNECTION_TIMEOUT_MS, 8000);
  const connectionString = env.DATABASE_URL;

  if (connectionString) {
    return {
      connectionString,
      ssl: env.PGSSL === 'false' ? false : { rejectUnauthorized: false },
      connectionTimeoutMillis
    };
  }

  const config: PoolConfig = {
    host: env.PGHOST ?? 'localhost',
    port: readNumber(env.PGPORT, 5432),
    user: env.PGUSER,
    password: env.PGPASSWORD,
    database: env.PGDATABASE,
    connectionTimeoutMillis
  };

  if (env.NODE_ENV === 'production') {
    const missing = (['PGHOST', 'PGUSER', 'PGDATABASE'] as const).filter((key) => !env[key]);
    if (missing.length) {
      throw new Error(
        `Database configuration is missing required env vars: ${missing.join(', ')}. Provide DATABASE_URL or PG* vars.`
      );
    }
    config.ssl = { rejectUnauthorized: false };
  }

  return config;
};

export const createPostgresPool = (env: NodeJS.ProcessEnv = process.env) => {
  const pool = new Pool(buildPoolConfig(env));
  pool.on('error', (error: Error) => {
    console.error('[storage] PostgreSQL connection pool reported an error:', error);
  });
  return pool;
};

// Повторяем подключение, пока база поднимается вместе с приложением
export const ensurePostgresConnection = async (executor: SqlExecutor, options: EnsureConnectionOptions = {}) => {
  const {
    attempts = readNumber(process.env.DB_CONNECT_MAX_ATTEMPTS, 5),
    baseDelayMs = readNumber(process.env.DB_CONNECT_RETRY_DELAY_MS, 500),
    maxDelayMs = readNumber(process.env.DB_CONNECT_MAX_DELAY_MS, 5000),
    logger = console.warn
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await executor.query('SELECT 1;');

      if (attempt > 1) {
        logger(`[storage] PostgreSQL connection restored after ${attempt} attempts.`);
      }

      return;
    } catch (error) {
      lastError = error;

      if (attempt >= attempts) {
        break;
      }

      const delay = Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
      logger(`[storage] Could not reach PostgreSQL (attempt ${attempt} of ${attempts}). Retrying in ${delay} ms.`);
      await wait(delay);
    }
  }

  if (lastError instanceof Error) {
    throw lastError;
  }

  throw new Error('Unknown PostgreSQL connection error');
};
