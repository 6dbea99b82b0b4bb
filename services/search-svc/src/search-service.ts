import { SearchFailure, ValidationError, describeError, getLogger } from '@competency-search/common';
import type { Logger } from 'pino';

import type { SearchRuntimeConfig } from './config';
import type { EncodingService } from './encoding-service';
import { compileFilters, type CompiledPredicate } from './filter-translator';
import { fuseReciprocalRank, rankSingleBranch, type Branch, type RankedCandidate } from './fusion';
import { SEARCH_TYPES, type SearchRequest, type SearchResult, type SearchType } from './types';
import { guardStorage, type VectorRepository } from './vector-repository';

export const MAX_SEARCH_TEXT_LENGTH = 10_000;

interface SearchServiceDependencies {
  repository: VectorRepository;
  encoder: EncodingService;
  config: SearchRuntimeConfig;
  logger?: Logger;
}

interface SearchTimings {
  encodingMs: number;
  retrievalMs: number;
  hydrationMs: number;
  totalMs: number;
}

function isSearchType(value: unknown): value is SearchType {
  return typeof value === 'string' && SEARCH_TYPES.some((type) => type === value);
}

export class SearchService {
  private readonly repository: VectorRepository;
  private readonly encoder: EncodingService;
  private readonly config: SearchRuntimeConfig;
  private readonly logger: Logger;

  constructor(deps: SearchServiceDependencies) {
    this.repository = deps.repository;
    this.encoder = deps.encoder;
    this.config = deps.config;
    this.logger = (deps.logger ?? getLogger({ module: 'search-service' })).child({ module: 'search-service' });
  }

  /** Depth requested from each branch before fusion. */
  branchDepth(top: number): number {
    return Math.ceil(this.config.oversampleFactor * top);
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const totalStart = Date.now();
    const text = this.validateText(request.text);
    const top = this.validateTop(request.top);
    if (!isSearchType(request.searchType)) {
      throw new ValidationError(`Unknown search type "${String(request.searchType)}".`, {
        details: { allowed: SEARCH_TYPES }
      });
    }
    const predicate = compileFilters(request.filters);

    const timings: SearchTimings = { encodingMs: 0, retrievalMs: 0, hydrationMs: 0, totalMs: 0 };
    let candidates: RankedCandidate[];

    switch (request.searchType) {
      case 'semantic': {
        const encodeStart = Date.now();
        const vector = await this.encoder.encodeDense(text);
        timings.encodingMs = Date.now() - encodeStart;

        const retrievalStart = Date.now();
        const points = await guardStorage('queryDense', this.config.storageTimeoutMs, () =>
          this.repository.queryDense(vector, top, predicate)
        );
        timings.retrievalMs = Date.now() - retrievalStart;
        candidates = rankSingleBranch(points, 'dense');
        break;
      }
      case 'sparse': {
        const encodeStart = Date.now();
        const vector = await this.encoder.encodeSparse(text);
        timings.encodingMs = Date.now() - encodeStart;

        const retrievalStart = Date.now();
        const points = await guardStorage('querySparse', this.config.storageTimeoutMs, () =>
          this.repository.querySparse(vector, top, predicate)
        );
        timings.retrievalMs = Date.now() - retrievalStart;
        candidates = rankSingleBranch(points, 'sparse');
        break;
      }
      case 'hybrid':
        candidates = await this.hybridCandidates(text, top, predicate, timings);
        break;
    }

    const selected = candidates.slice(0, top);
    const hydrationStart = Date.now();
    const payloads = await guardStorage('getMany', this.config.storageTimeoutMs, () =>
      this.repository.getMany(selected.map((candidate) => candidate.id))
    );
    timings.hydrationMs = Date.now() - hydrationStart;

    const results: SearchResult[] = [];
    for (const candidate of selected) {
      const competency = payloads.get(candidate.id);
      if (!competency) {
        // deleted between retrieval and hydration
        this.logger.debug({ identifier: candidate.id }, 'Dropping candidate without payload.');
        continue;
      }
      results.push({ identifier: candidate.id, competency, score: candidate.score });
    }

    timings.totalMs = Date.now() - totalStart;
    this.logger.info(
      {
        searchType: request.searchType,
        top,
        filterCount: request.filters?.length ?? 0,
        candidates: candidates.length,
        returned: results.length,
        timings
      },
      'Search completed.'
    );

    return results;
  }

  private async hybridCandidates(
    text: string,
    top: number,
    predicate: CompiledPredicate,
    timings: SearchTimings
  ): Promise<RankedCandidate[]> {
    const encodeStart = Date.now();
    const [dense, sparse] = await Promise.all([this.encoder.encodeDense(text), this.encoder.encodeSparse(text)]);
    timings.encodingMs = Date.now() - encodeStart;

    const depth = this.branchDepth(top);
    const retrievalStart = Date.now();
    const [denseOutcome, sparseOutcome] = await Promise.allSettled([
      guardStorage('queryDense', this.config.storageTimeoutMs, () => this.repository.queryDense(dense, depth, predicate)),
      guardStorage('querySparse', this.config.storageTimeoutMs, () => this.repository.querySparse(sparse, depth, predicate))
    ]);
    timings.retrievalMs = Date.now() - retrievalStart;

    if (denseOutcome.status === 'rejected' || sparseOutcome.status === 'rejected') {
      const failedBranches: Branch[] = [];
      if (denseOutcome.status === 'rejected') failedBranches.push('dense');
      if (sparseOutcome.status === 'rejected') failedBranches.push('sparse');

      const [branch] = failedBranches;
      const reason: unknown =
        denseOutcome.status === 'rejected'
          ? denseOutcome.reason
          : sparseOutcome.status === 'rejected'
            ? sparseOutcome.reason
            : undefined;
      this.logger.error({ failedBranches, error: reason }, 'Hybrid retrieval branch failed.');
      throw new SearchFailure(`Hybrid ${branch} retrieval failed: ${describeError(reason)}`, {
        details: { branch, failedBranches },
        cause: reason
      });
    }

    this.logger.debug(
      { depth, denseHits: denseOutcome.value.length, sparseHits: sparseOutcome.value.length },
      'Hybrid branches retrieved.'
    );

    return fuseReciprocalRank(denseOutcome.value, sparseOutcome.value, this.config.rrfK);
  }

  private validateText(value: unknown): string {
    if (typeof value !== 'string') {
      throw new ValidationError('Search text is required.');
    }
    const text = value.trim();
    if (text.length === 0) {
      throw new ValidationError('Search text must not be empty.');
    }
    if (text.length > MAX_SEARCH_TEXT_LENGTH) {
      throw new ValidationError(`Search text exceeds ${MAX_SEARCH_TEXT_LENGTH} characters.`, {
        details: { length: text.length }
      });
    }
    return text;
  }

  private validateTop(value: unknown): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > this.config.maxTop) {
      throw new ValidationError(`top must be an integer between 1 and ${this.config.maxTop}.`, {
        details: { top: value }
      });
    }
    return value;
  }
}
