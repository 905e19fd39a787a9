import type { FastifyBaseLogger } from 'fastify';
import mongoose from 'mongoose';

let connecting: Promise<typeof mongoose> | null = null;

/** Opens the process-wide connection. Later calls reuse the first attempt. */
export async function connectMongo(mongoUri: string, dbName?: string | null) {
  if (!connecting) {
    connecting = mongoose.connect(mongoUri, {
      ...(dbName ? { dbName } : {}),
      serverSelectionTimeoutMS: 5000,
    });
    // A failed first attempt must not pin the module to a rejected promise.
    connecting.catch(() => {
      connecting = null;
    });
  }
  await connecting;
}

export type RetryOptions = {
  log: FastifyBaseLogger;
  initialDelayMs?: number;
  maxDelayMs?: number;
};

/**
 * Connects in the background, retrying with a doubling delay until the first success.
 * Returns a function that cancels any pending retry.
 */
export function connectMongoWithRetry(
  mongoUri: string,
  dbName: string | null,
  { log, initialDelayMs = 1000, maxDelayMs = 30_000 }: RetryOptions
): () => void {
  let stopped = false;
  let timer: NodeJS.Timeout | undefined;

  async function attempt(n: number, delayMs: number) {
    if (stopped) return;
    try {
      await connectMongo(mongoUri, dbName);
      log.info({ attempt: n, databaseName: dbName }, 'mongo connected');
    } catch (err) {
      if (stopped) return;
      log.warn({ err, attempt: n, retryInMs: delayMs }, 'mongo connection failed, retrying');
      timer = setTimeout(() => {
        void attempt(n + 1, Math.min(delayMs * 2, maxDelayMs));
      }, delayMs);
    }
  }

  void attempt(1, Math.min(initialDelayMs, maxDelayMs));

  return () => {
    stopped = true;
    if (timer) clearTimeout(timer);
  };
}

/** Runs `listener` each time the process-wide connection (re)connects. */
export function onMongoConnected(listener: () => void): () => void {
  mongoose.connection.on('connected', listener);
  return () => {
    mongoose.connection.off('connected', listener);
  };
}

export async function disconnectMongo() {
  connecting = null;
  await mongoose.disconnect();
}

export function isMongoConnected(): boolean {
  return mongoose.connection.readyState === mongoose.ConnectionStates.connected;
}

export function connectionStatus(): string {
  switch (mongoose.connection.readyState) {
    case mongoose.ConnectionStates.connected:
      return 'connected';
    case mongoose.ConnectionStates.connecting:
      return 'connecting';
    case mongoose.ConnectionStates.disconnecting:
      return 'disconnecting';
    default:
      return 'disconnected';
  }
}

export async function listMongoCollections(): Promise<string[]> {
  const db = mongoose.connection.db;
  if (!db) return [];
  const collections = await db.listCollections({}, { nameOnly: true }).toArray();
  return collections.map((c) => c.name);
}
