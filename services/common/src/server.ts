import fastify, { type FastifyInstance } from 'fastify';

import { getConfig } from './config';
import { describeError, errorHandlerPlugin } from './errors';
import { requestLoggingPlugin } from './logger';
import type { HealthStatus } from './types';

export interface BuildServerOptions {
  disableDefaultHealthRoute?: boolean;
  bodyLimit?: number;
  /** Backs `/ready`; without it the route only reports that the process is up. */
  readinessCheck?: () => Promise<HealthStatus>;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const config = getConfig();
  const helmet = await import('@fastify/helmet');
  const cors = await import('@fastify/cors');

  const app = fastify({
    logger: { level: config.runtime.logLevel },
    disableRequestLogging: true,
    trustProxy: true,
    bodyLimit: options.bodyLimit
  });

  await app.register(requestLoggingPlugin);
  await app.register(errorHandlerPlugin);

  await app.register(helmet.default, { global: true });
  await app.register(cors.default, {
    origin: true
  });

  if (!options.disableDefaultHealthRoute) {
    app.get('/health', async () => ({
      status: 'ok',
      service: config.runtime.serviceName
    }));
  }

  app.get('/ready', async (_request, reply) => {
    if (!options.readinessCheck) {
      return { status: 'ready', service: config.runtime.serviceName };
    }

    const health = await options
      .readinessCheck()
      .catch((error: unknown): HealthStatus => ({ status: 'unhealthy', message: describeError(error) }));
    if (health.status !== 'healthy') {
      reply.code(503);
      return { status: 'not_ready', service: config.runtime.serviceName, message: health.message };
    }
    return { status: 'ready', service: config.runtime.serviceName };
  });

  return app;
}
