import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { IndexingService } from './indexing-service';
import {
  createEntitySchema,
  deleteEntitySchema,
  getEntitySchema,
  textSearchSchema,
  updateEntitySchema
} from './schemas';
import type { SearchService } from './search-service';
import type {
  CreateEntityRequestBody,
  Entity,
  SearchRequestBody,
  SearchResponseBody,
  UpdateEntityRequestBody
} from './types';
import type { VectorRepository } from './vector-repository';

interface RegisterRoutesOptions {
  indexingService: IndexingService;
  searchService: SearchService;
  repository: VectorRepository;
  serviceName: string;
}

interface EntityParams {
  id: string;
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const { indexingService, searchService, repository } = dependencies;

  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    const health = await repository.healthCheck();
    if (health.status !== 'healthy') {
      reply.code(503);
      return { status: 'degraded', service: dependencies.serviceName, store: { driver: repository.driver, ...health } };
    }
    return { status: 'ok', service: dependencies.serviceName, store: { driver: repository.driver, ...health } };
  });

  app.post(
    '/entities',
    { schema: createEntitySchema },
    async (request: FastifyRequest<{ Body: CreateEntityRequestBody }>, reply: FastifyReply): Promise<Entity> => {
      const entity = await indexingService.index(request.body.competency, request.body.identifier);
      reply.code(201);
      return entity;
    }
  );

  app.get(
    '/entities/:id',
    { schema: getEntitySchema },
    async (request: FastifyRequest<{ Params: EntityParams }>): Promise<Entity> => indexingService.get(request.params.id)
  );

  app.put(
    '/entities/:id',
    { schema: updateEntitySchema },
    async (request: FastifyRequest<{ Params: EntityParams; Body: UpdateEntityRequestBody }>): Promise<Entity> =>
      indexingService.update(request.params.id, request.body.competency)
  );

  app.delete(
    '/entities/:id',
    { schema: deleteEntitySchema },
    async (request: FastifyRequest<{ Params: EntityParams }>, reply: FastifyReply) => {
      await indexingService.delete(request.params.id);
      return reply.code(204).send();
    }
  );

  app.post(
    '/search/text',
    { schema: textSearchSchema },
    async (request: FastifyRequest<{ Body: SearchRequestBody }>): Promise<SearchResponseBody> => {
      const results = await searchService.search({
        text: request.body.text,
        searchType: request.body.search_type ?? 'semantic',
        top: request.body.top ?? 10,
        filters: request.body.filters ?? []
      });
      return { results };
    }
  );
}
