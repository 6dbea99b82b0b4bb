import type { Logger } from 'pino';

import { createIndexingStrategy } from './indexing-strategies';
import { resolveMapper, type MapperRegistry } from './mappers/registry';
import type { SearchEngineClient } from './search-engine-client';
import type { Competency, ImportOptions, ImportSummary } from './types';

interface ImportServiceDependencies {
  registry: MapperRegistry;
  client: Pick<SearchEngineClient, 'createEntity'>;
  logger: Logger;
}

export class ImportService {
  private readonly registry: MapperRegistry;
  private readonly client: Pick<SearchEngineClient, 'createEntity'>;
  private readonly logger: Logger;

  constructor(deps: ImportServiceDependencies) {
    this.registry = deps.registry;
    this.client = deps.client;
    this.logger = deps.logger.child({ module: 'import-service' });
  }

  /** Maps and expands every record before forwarding anything. */
  expand(records: readonly unknown[], options: ImportOptions): Competency[] {
    const factory = resolveMapper(this.registry, options.provider);
    const strategy = createIndexingStrategy(options.indexing_strategy, options.fields_to_index);
    const context = { provider: options.provider, type: options.competency_type, lang: options.lang };

    return records.flatMap((raw) => strategy.expand(factory(raw, context).toCompetency()));
  }

  async importRecord(raw: unknown, options: ImportOptions): Promise<ImportSummary> {
    return this.importBatch([raw], options);
  }

  async importBatch(records: readonly unknown[], options: ImportOptions): Promise<ImportSummary> {
    const started = Date.now();
    const competencies = this.expand(records, options);
    const identifiers: string[] = [];

    // The search engine accepts one entity per request.
    for (const competency of competencies) {
      const entity = await this.client.createEntity(competency);
      identifiers.push(entity.identifier);
    }

    this.logger.info(
      {
        provider: options.provider,
        records: records.length,
        imported: identifiers.length,
        elapsedMs: Date.now() - started
      },
      'Import completed.'
    );

    return { imported: identifiers.length, identifiers };
  }
}
