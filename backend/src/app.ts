import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { AppConfig } from './config.js';
import { AppError, ValidationError, truncateMessage } from './errors.js';
import type { DocumentStore } from './store/documentStore.js';
import { describeStore } from './services/diagnostics.js';
import { authRoutes } from './routes/auth.js';
import { coursesRoutes } from './routes/courses.js';
import { scheduleRoutes } from './routes/schedule.js';
import { announcementsRoutes } from './routes/announcements.js';

export type BuildAppOptions = {
  store: DocumentStore;
  config: Pick<AppConfig, 'mongoUri' | 'databaseName'>;
  logger?: FastifyServerOptions['logger'];
};

export async function buildApp({ store, config, logger = true }: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger });
  await app.register(cors, { origin: true, credentials: true });

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    if (err instanceof ValidationError) {
      return reply.code(err.statusCode).send({ error: err.code, message: err.message, details: err.details });
    }
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        req.log.error({ err }, err.message);
      }
      return reply.code(err.statusCode).send({ error: err.code, message: truncateMessage(err.message) });
    }
    // Fastify's own client errors, e.g. a malformed JSON body
    if (typeof err.statusCode === 'number' && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.code || 'BAD_REQUEST', message: err.message });
    }
    req.log.error({ err }, 'unhandled error');
    return reply.code(500).send({ error: 'INTERNAL_ERROR', message: truncateMessage(err.message) });
  });

  app.get('/', async () => ({ message: 'Student Schedule Organizer API' }));
  app.get('/health', async () => describeStore(store, config));

  await authRoutes(app, store);
  await coursesRoutes(app, store);
  await scheduleRoutes(app, store);
  await announcementsRoutes(app, store);

  return app;
}
