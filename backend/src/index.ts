import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { connectMongoWithRetry, onMongoConnected } from './db.js';
import './models/index.js';
import { MongoDocumentStore } from './store/mongoDocumentStore.js';

const config = loadConfig();
const store = new MongoDocumentStore();

const app = await buildApp({ store, config, logger: { level: config.logLevel } });

if (config.mongoUri) {
  // Until the first connect succeeds, store-backed routes answer 503 and announcements fall back.
  onMongoConnected(() => {
    store.ensureIndexes(app.log).catch((e) => app.log.error(e, 'index setup failed'));
  });
  connectMongoWithRetry(config.mongoUri, config.databaseName, { log: app.log });
} else {
  app.log.warn('MONGO_URI not set, running without database');
}

await app.listen({ port: config.port, host: config.host });
