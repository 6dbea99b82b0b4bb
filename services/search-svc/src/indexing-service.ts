import { randomUUID } from 'crypto';

import { NotFoundError, ValidationError } from '@competency-search/common';
import type { Logger } from 'pino';
import { z } from 'zod';

import { parseCompetency, withIndexedText } from './competency';
import type { SearchRuntimeConfig } from './config';
import type { EncodingService } from './encoding-service';
import type { Entity } from './types';
import { guardStorage, type VectorRepository } from './vector-repository';

export interface IndexingServiceDependencies {
  repository: VectorRepository;
  encoder: EncodingService;
  config: Pick<SearchRuntimeConfig, 'storageTimeoutMs'>;
  logger: Logger;
}

const identifierSchema = z.string().uuid();

export function parseIdentifier(identifier: unknown): string {
  const parsed = identifierSchema.safeParse(identifier);
  if (!parsed.success) {
    throw new ValidationError('Identifier must be a UUID.', { details: { identifier } });
  }
  return parsed.data.toLowerCase();
}

export class IndexingService {
  private readonly repository: VectorRepository;
  private readonly encoder: EncodingService;
  private readonly storageTimeoutMs: number;
  private readonly logger: Logger;

  constructor(deps: IndexingServiceDependencies) {
    this.repository = deps.repository;
    this.encoder = deps.encoder;
    this.storageTimeoutMs = deps.config.storageTimeoutMs;
    this.logger = deps.logger;
  }

  /**
   * Validates, encodes and upserts one competency. Without an identifier a new
   * one is minted, so re-indexing identical content creates another record.
   */
  async index(raw: unknown, identifier?: string): Promise<Entity> {
    const competency = withIndexedText(parseCompetency(raw));
    const id = identifier === undefined ? randomUUID() : parseIdentifier(identifier);
    const text = competency.indexed_text ?? competency.title;

    const started = Date.now();
    const [dense, sparse] = await Promise.all([this.encoder.encodeDense(text), this.encoder.encodeSparse(text)]);
    const encodedAt = Date.now();

    await guardStorage('upsert', this.storageTimeoutMs, () => this.repository.upsert(id, dense, sparse, competency));

    this.logger.info(
      {
        identifier: id,
        provider: competency.provider,
        code: competency.code,
        sparseTerms: sparse.indices.length,
        encodeMs: encodedAt - started,
        upsertMs: Date.now() - encodedAt
      },
      'Competency indexed.'
    );

    return { identifier: id, competency };
  }

  async get(identifier: string): Promise<Entity> {
    const id = parseIdentifier(identifier);
    const competency = await guardStorage('get', this.storageTimeoutMs, () => this.repository.get(id));
    if (!competency) {
      throw new NotFoundError(`Entity ${id} not found.`, { details: { identifier: id } });
    }
    return { identifier: id, competency };
  }

  /** Re-indexes an existing entity under its identifier. */
  async update(identifier: string, raw: unknown): Promise<Entity> {
    const existing = await this.get(identifier);
    return this.index(raw, existing.identifier);
  }

  async delete(identifier: string): Promise<void> {
    const id = parseIdentifier(identifier);
    const deleted = await guardStorage('delete', this.storageTimeoutMs, () => this.repository.delete(id));
    if (!deleted) {
      throw new NotFoundError(`Entity ${id} not found.`, { details: { identifier: id } });
    }
    this.logger.info({ identifier: id }, 'Competency deleted.');
  }
}
