import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { ImportService } from './import-service';
import { importBatchSchema, importRecordSchema } from './schemas';
import type { BatchImportRequestBody, ImportOptions, ImportRequestBody, ImportSummary } from './types';

interface RegisterRoutesOptions {
  importService: Pick<ImportService, 'importRecord' | 'importBatch'>;
}

function importOptions(body: ImportOptions): ImportOptions {
  return {
    provider: body.provider,
    competency_type: body.competency_type,
    lang: body.lang,
    indexing_strategy: body.indexing_strategy,
    fields_to_index: body.fields_to_index
  };
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const { importService } = dependencies;

  app.post(
    '/import',
    { schema: importRecordSchema },
    async (request: FastifyRequest<{ Body: ImportRequestBody }>, reply: FastifyReply): Promise<ImportSummary> => {
      const summary = await importService.importRecord(request.body.data, importOptions(request.body));
      reply.code(201);
      return summary;
    }
  );

  app.post(
    '/import/batch',
    { schema: importBatchSchema },
    async (request: FastifyRequest<{ Body: BatchImportRequestBody }>, reply: FastifyReply): Promise<ImportSummary> => {
      const summary = await importService.importBatch(request.body.items, importOptions(request.body));
      reply.code(201);
      return summary;
    }
  );
}
