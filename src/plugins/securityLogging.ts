import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { redactSensitive } from '../lib/redaction.js';

function actorSummary(req: FastifyRequest) {
  const kind = req.headers['x-actor-kind'];
  const id = req.headers['x-actor-id'];
  return {
    kind: typeof kind === 'string' ? kind : null,
    id: typeof id === 'string' ? id : null
  };
}

/** Logs each routed request with credentials and contact details redacted. */
const securityLogging: FastifyPluginAsync = async (app) => {
  app.addHook('preHandler', async (req) => {
    req.log.info(
      {
        actor: actorSummary(req),
        request: redactSensitive({
          method: req.method,
          url: req.url,
          route: req.routeOptions.url,
          headers: req.headers,
          query: req.query,
          params: req.params,
          body: req.body
        })
      },
      'request.received'
    );
  });
};

export const securityLoggingPlugin = fp(securityLogging, { name: 'security-logging' });
