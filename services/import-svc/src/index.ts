import { buildServer, getLogger } from '@competency-search/common';

import { getImportServiceConfig } from './config';
import { ImportService } from './import-service';
import { createMapperRegistry } from './mappers/registry';
import { registerRoutes } from './routes';
import { SearchEngineClient } from './search-engine-client';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'competency-import-svc';
  const logger = getLogger({ module: 'bootstrap' });

  try {
    const config = getImportServiceConfig();
    logger.info(
      { serviceName: config.base.runtime.serviceName, searchEngine: config.searchEngine.baseUrl },
      'Configuration loaded'
    );

    const client = new SearchEngineClient(config.searchEngine, getLogger({ module: 'search-engine-client' }));
    const importService = new ImportService({
      registry: createMapperRegistry(),
      client,
      logger: getLogger({ module: 'import' })
    });

    const server = await buildServer();
    await registerRoutes(server, { importService });

    await server.listen({ port: config.base.runtime.port, host: config.base.runtime.host });
    logger.info({ port: config.base.runtime.port }, 'Import service listening');

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
    logger.error({ error }, 'Failed to bootstrap import service');
    process.exit(1);
  }
}

void bootstrap();
