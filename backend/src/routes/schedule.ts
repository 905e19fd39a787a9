import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DocumentStore } from '../store/documentStore.js';
import { createScheduleEntry, listScheduleByOwner } from '../services/schedule.js';

type OwnerParams = {
  ownerEmail: string;
};

export async function scheduleRoutes(app: FastifyInstance, store: DocumentStore) {
  app.post('/api/schedule', async (req: FastifyRequest, reply: FastifyReply) => {
    const id = await createScheduleEntry(store, req.body);
    return reply.send({ id });
  });

  app.get<{ Params: OwnerParams }>(
    '/api/schedule/:ownerEmail',
    async (req: FastifyRequest<{ Params: OwnerParams }>, reply: FastifyReply) => {
      const entries = await listScheduleByOwner(store, req.params.ownerEmail);
      return reply.send(entries);
    }
  );
}
