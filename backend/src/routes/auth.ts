import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { DocumentStore } from '../store/documentStore.js';
import { loginUser, registerUser, updateProfile } from '../services/identity.js';

type ProfileParams = {
  email: string;
};

// Bodies stay `unknown` here: the identity service validates them.
export async function authRoutes(app: FastifyInstance, store: DocumentStore) {
  app.post('/api/register', async (req: FastifyRequest, reply: FastifyReply) => {
    const id = await registerUser(store, req.body);
    req.log.info({ userId: id }, 'user registered');
    return reply.send({ message: 'Registered', id });
  });

  app.post('/api/login', async (req: FastifyRequest, reply: FastifyReply) => {
    const { token, profile } = await loginUser(store, req.body);
    return reply.send({ message: 'Logged in', token, profile });
  });

  app.put<{ Params: ProfileParams }>(
    '/api/profile/:email',
    async (req: FastifyRequest<{ Params: ProfileParams }>, reply: FastifyReply) => {
      const user = await updateProfile(store, req.params.email, req.body);
      return reply.send(user);
    }
  );
}
