import { ConfigurationError } from "../utils/error";

export interface DatabaseConfig {
  connectionString: string;
  dbName?: string;
  maxPoolSize: number;
  minPoolSize: number;
}

const DEFAULT_MAX_POOL_SIZE = 10;
const DEFAULT_MIN_POOL_SIZE = 5;

export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
  const connectionString = env.DB_CONNECTION_STRING;
  if (!connectionString) {
    throw new ConfigurationError("DB_CONNECTION_STRING is not set");
  }

  return {
    connectionString,
    ...(env.DB_NAME ? { dbName: env.DB_NAME } : {}),
    maxPoolSize: readPoolSize(env, "DB_MAX_POOL_SIZE", DEFAULT_MAX_POOL_SIZE),
    minPoolSize: readPoolSize(env, "DB_MIN_POOL_SIZE", DEFAULT_MIN_POOL_SIZE),
  };
}

function readPoolSize(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = env[key];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const size = Number(raw);
  if (!Number.isInteger(size) || size < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return size;
}
