import { buildServer, getLogger } from '@competency-search/common';

import { createAppContext, type AppContext } from './app-context';
import { getSearchServiceConfig } from './config';
import { registerRoutes } from './routes';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'competency-search-svc';
  const logger = getLogger({ module: 'bootstrap' });
  let context: AppContext | null = null;

  try {
    const config = getSearchServiceConfig();
    logger.info(
      { serviceName: config.base.runtime.serviceName, store: config.store, encoder: config.encoder.provider },
      'Configuration loaded'
    );

    context = await createAppContext(config);
    const activeContext = context;

    const server = await buildServer({
      disableDefaultHealthRoute: true,
      readinessCheck: () => activeContext.repository.healthCheck()
    });

    server.get('/health', async () => ({ status: 'ok', service: config.base.runtime.serviceName }));

    const underPressure = await import('@fastify/under-pressure');
    await server.register(underPressure.default, {
      maxEventLoopDelay: 2000,
      maxHeapUsedBytes: 1_024 * 1_024 * 1024,
      maxRssBytes: 1_536 * 1_024 * 1024,
      healthCheck: async () => {
        const health = await activeContext.repository.healthCheck();
        if (health.status !== 'healthy') {
          throw new Error(health.message ?? `${activeContext.repository.driver} degraded`);
        }
        return true;
      },
      healthCheckInterval: 10000
    });

    await registerRoutes(server, {
      indexingService: context.indexingService,
      searchService: context.searchService,
      repository: context.repository,
      serviceName: config.base.runtime.serviceName
    });

    server.addHook('onClose', async () => {
      await activeContext.close();
    });

    await server.listen({ port: config.base.runtime.port, host: config.base.runtime.host });
    logger.info({ port: config.base.runtime.port }, 'Search service listening');

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap search service');
    if (context) {
      await context.close().catch((closeError: unknown) => {
        logger.error({ error: closeError }, 'Failed to release application context.');
      });
    }
    process.exit(1);
  }
}

void bootstrap();
