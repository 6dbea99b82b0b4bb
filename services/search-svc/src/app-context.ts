import { getLogger } from '@competency-search/common';
import type { Logger } from 'pino';

import type { SearchServiceConfig } from './config';
import { createEmbeddingProviders, type EmbeddingProviders } from './embedding-provider';
import { ProviderEncodingService, type EncodingService } from './encoding-service';
import { IndexingService } from './indexing-service';
import { InMemoryVectorRepository } from './memory-repository';
import { PgVectorClient } from './pgvector-client';
import { SearchService } from './search-service';
import type { VectorRepository } from './vector-repository';

export interface AppContext {
  config: SearchServiceConfig;
  logger: Logger;
  encoder: EncodingService;
  repository: VectorRepository;
  indexingService: IndexingService;
  searchService: SearchService;
  close(): Promise<void>;
}

export function createRepository(config: SearchServiceConfig): VectorRepository {
  if (config.store === 'memory') {
    return new InMemoryVectorRepository(config.encoder.denseDimensions, getLogger({ module: 'memory-repository' }));
  }
  return new PgVectorClient(config.pgvector, getLogger({ module: 'pgvector-client' }));
}

/**
 * Wires the process-wide dependencies. The repository and the dense encoder
 * width are verified before the services are built; a failed check closes the
 * repository and rethrows.
 */
export async function createAppContext(
  config: SearchServiceConfig,
  repository: VectorRepository = createRepository(config),
  providers: EmbeddingProviders = createEmbeddingProviders(config.encoder, getLogger({ module: 'embedding-provider' }))
): Promise<AppContext> {
  const logger = getLogger({ module: 'app-context' });
  const encoder = new ProviderEncodingService(providers, config.encoder, getLogger({ module: 'encoding-service' }));

  try {
    await repository.verify();
    await encoder.verifyDimensions();
  } catch (error) {
    logger.error({ error, driver: repository.driver }, 'Startup verification failed.');
    await repository.close();
    throw error;
  }

  const indexingService = new IndexingService({
    repository,
    encoder,
    config: config.search,
    logger: getLogger({ module: 'indexing-service' })
  });

  const searchService = new SearchService({
    repository,
    encoder,
    config: config.search,
    logger: getLogger({ module: 'search-service' })
  });

  let closed = false;
  logger.info({ driver: repository.driver, encoder: config.encoder.provider }, 'Application context ready.');

  return {
    config,
    logger,
    encoder,
    repository,
    indexingService,
    searchService,
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await repository.close();
      logger.info('Application context closed.');
    }
  };
}
