import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DocumentStore } from '../store/documentStore.js';
import { listAnnouncements } from '../services/announcements.js';

export async function announcementsRoutes(app: FastifyInstance, store: DocumentStore) {
  app.get('/api/announcements', async (req: FastifyRequest, reply: FastifyReply) => {
    return reply.send(await listAnnouncements(store, req.log));
  });
}
