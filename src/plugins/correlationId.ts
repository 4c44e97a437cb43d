import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { randomUUID } from 'node:crypto';

const correlationId: FastifyPluginAsync = async (app) => {
  app.addHook('onRequest', async (req, reply) => {
    const incoming = req.headers['x-correlation-id'];
    const id = (Array.isArray(incoming) ? incoming[0] : incoming) || randomUUID();

    req.headers['x-correlation-id'] = id;
    reply.header('x-correlation-id', id);
  });
};

export const correlationIdPlugin = fp(correlationId, { name: 'correlation-id' });
