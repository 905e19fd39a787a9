import type { AppConfig } from '../config.js';
import { describeCause } from '../errors.js';
import type { DocumentStore } from '../store/documentStore.js';

const MAX_COLLECTIONS = 10;
const ERROR_PREVIEW_LENGTH = 50;

export type StoreDiagnostics = {
  backend: 'running';
  database: string;
  databaseUrl: 'set' | 'not set';
  databaseName: 'set' | 'not set';
  connectionStatus: 'connected' | 'not connected';
  collections: string[];
};

/** Connectivity summary for /health. Never throws. */
export async function describeStore(
  store: DocumentStore,
  config: Pick<AppConfig, 'mongoUri' | 'databaseName'>
): Promise<StoreDiagnostics> {
  const report: StoreDiagnostics = {
    backend: 'running',
    database: config.mongoUri ? 'not connected' : 'not configured',
    databaseUrl: config.mongoUri ? 'set' : 'not set',
    databaseName: config.databaseName ? 'set' : 'not set',
    connectionStatus: 'not connected',
    collections: [],
  };

  if (!store.isAvailable()) {
    return report;
  }

  report.connectionStatus = 'connected';
  try {
    report.collections = (await store.listCollections()).slice(0, MAX_COLLECTIONS);
    report.database = 'connected';
  } catch (err) {
    report.database = `connected with error: ${describeCause(err).slice(0, ERROR_PREVIEW_LENGTH)}`;
  }
  return report;
}
