import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DocumentStore } from '../store/documentStore.js';
import { createCourse, listCoursesByOwner } from '../services/courses.js';

type OwnerParams = {
  ownerEmail: string;
};

export async function coursesRoutes(app: FastifyInstance, store: DocumentStore) {
  app.post('/api/courses', async (req: FastifyRequest, reply: FastifyReply) => {
    const id = await createCourse(store, req.body);
    return reply.send({ id });
  });

  app.get<{ Params: OwnerParams }>(
    '/api/courses/:ownerEmail',
    async (req: FastifyRequest<{ Params: OwnerParams }>, reply: FastifyReply) => {
      const courses = await listCoursesByOwner(store, req.params.ownerEmail);
      return reply.send(courses);
    }
  );
}
