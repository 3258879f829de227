export type StorageDriver = 'file' | 'memory' | 'postgres';

export interface OpenAiConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AppConfig {
  host: string;
  port: number;
  dataDir: string;
  storageDriver: StorageDriver;
  /** null when no API key is configured: analyses then use the mock scorer only. */
  openAi: OpenAiConfig | null;
  sessionTtlMs: number;
  adminUsername: string | null;
  requestLogEnabled: boolean;
  jsonBodyLimit: string;
}

const STORAGE_DRIVERS: StorageDriver[] = ['file', 'memory', 'postgres'];

const readString = (value: string | undefined): string | undefined => {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

const readNumber = (value: string | undefined, fallback: number, min = Number.NEGATIVE_INFINITY) => {
  const raw = readString(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
};

const readBoolean = (value: string | undefined, fallback: boolean) => {
  const raw = readString(value)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw);
};

const readStorageDriver = (value: string | undefined): StorageDriver => {
  const raw = readString(value)?.toLowerCase();
  return STORAGE_DRIVERS.find((driver) => driver === raw) ?? 'file';
};

export const resolveAppConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const apiKey = readString(env.OPENAI_API_KEY);

  return {
    host: readString(env.HOST) ?? '0.0.0.0',
    port: Math.trunc(readNumber(env.PORT, 8080, 0)),
    dataDir: readString(env.DATA_DIR) ?? 'data',
    storageDriver: readStorageDriver(env.STORAGE_DRIVER),
    openAi: apiKey
      ? {
          apiKey,
          model: readString(env.OPENAI_MODEL) ?? 'gpt-3.5-turbo',
          temperature: readNumber(env.OPENAI_TEMPERATURE, 0.3, 0),
          maxTokens: Math.trunc(readNumber(env.OPENAI_MAX_TOKENS, 1000, 1))
        }
      : null,
    sessionTtlMs: readNumber(env.SESSION_TTL_MINUTES, 720, 1) * 60 * 1000,
    adminUsername: readString(env.ADMIN_USERNAME) ?? null,
    requestLogEnabled: readBoolean(env.REQUEST_LOG_ENABLED, true),
    jsonBodyLimit: readString(env.JSON_BODY_LIMIT) ?? '1mb'
  };
};
