import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { correlationIdPlugin } from './plugins/correlationId.js';
import { dataLayerPlugin } from './plugins/dataLayer.js';
import { securityLoggingPlugin } from './plugins/securityLogging.js';
import { errorEnvelopePlugin } from './plugins/errorEnvelope.js';
import { customerRoutes } from './modules/customers/index.js';
import { repairRoutes } from './modules/repairs/index.js';

export const SERVICE_NAME = 'windshield-repair-engine';

export function buildApp() {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: { colorize: true }
            }
          : undefined
    }
  });

  app.register(cors);
  app.register(correlationIdPlugin);
  app.register(securityLoggingPlugin);
  app.register(errorEnvelopePlugin);
  app.register(dataLayerPlugin);

  app.get('/health', async () => ({ ok: true, service: SERVICE_NAME }));

  app.register(repairRoutes, { prefix: '/api/v1' });
  app.register(customerRoutes, { prefix: '/api/v1' });

  return app;
}
