export type AppConfig = {
  mongoUri: string | null;
  databaseName: string | null;
  port: number;
  host: string;
  logLevel: string;
};

const DEFAULT_PORT = 8000;

function readTrimmed(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key];
  return value && value.trim() ? value.trim() : null;
}

function readPort(raw: string | null): number {
  if (!raw) return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    // Without MONGO_URI the API still boots; store-backed routes answer 503.
    mongoUri: readTrimmed(env, 'MONGO_URI'),
    databaseName: readTrimmed(env, 'DATABASE_NAME'),
    port: readPort(readTrimmed(env, 'PORT')),
    host: readTrimmed(env, 'HOST') ?? '0.0.0.0',
    logLevel: readTrimmed(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info',
  };
}
