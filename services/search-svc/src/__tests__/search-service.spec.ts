import { EncodingFailure, SearchFailure, StorageFailure, ValidationError } from '@competency-search/common';

import type { EncodingService } from '../encoding-service';
import { IndexingService } from '../indexing-service';
import { InMemoryVectorRepository } from '../memory-repository';
import { SearchService } from '../search-service';
import type { DenseVector, SparseVector } from '../types';
import { COOKING_ID, JAVA_ID, PYTHON_ID, createMockLogger, searchRuntimeConfig } from './fixtures';

const ESCO_ID = '00000000-0000-4000-8000-000000000004';

/** Fixed vectors per text so rankings can be derived by hand. */
class ScriptedEncoder implements EncodingService {
  readonly denseDimensions = 3;

  constructor(private readonly vectors: Record<string, { dense: DenseVector; sparse: SparseVector }>) {}

  async encodeDense(text: string): Promise<DenseVector> {
    return this.lookup(text).dense;
  }

  async encodeSparse(text: string): Promise<SparseVector> {
    return this.lookup(text).sparse;
  }

  private lookup(text: string) {
    const entry = this.vectors[text];
    if (!entry) {
      throw new EncodingFailure(`No vectors scripted for "${text}".`);
    }
    return entry;
  }
}

const encoder = new ScriptedEncoder({
  'Python Programming. Writing software in Python': {
    dense: [1, 0, 0],
    sparse: { indices: [0, 1], values: [1, 1] }
  },
  'Java Programming. Writing software in Java': {
    dense: [0.8, 0.6, 0],
    sparse: { indices: [0, 2], values: [1, 1] }
  },
  'Cooking. Preparing meals': {
    dense: [0, 0, 1],
    sparse: { indices: [3], values: [1] }
  },
  'ESCO-S123 Data Analysis': {
    dense: [0, 1, 0],
    sparse: { indices: [9], values: [1] }
  },
  programming: {
    dense: [0.9, 0.1, 0],
    sparse: { indices: [0], values: [1] }
  },
  'ESCO-S123': {
    dense: [0, 0.5, 0.5],
    sparse: { indices: [9], values: [2] }
  }
});

describe('SearchService', () => {
  let repository: InMemoryVectorRepository;
  let service: SearchService;
  const { logger } = createMockLogger();

  beforeEach(async () => {
    repository = new InMemoryVectorRepository(3);
    const indexing = new IndexingService({ repository, encoder, config: searchRuntimeConfig, logger });

    await indexing.index(
      {
        code: 'S001',
        lang: 'en',
        type: 'skill',
        provider: 'esco',
        title: 'Python Programming',
        description: 'Writing software in Python'
      },
      PYTHON_ID
    );
    await indexing.index(
      {
        code: 'S002',
        lang: 'en',
        type: 'skill',
        provider: 'esco',
        title: 'Java Programming',
        description: 'Writing software in Java'
      },
      JAVA_ID
    );
    await indexing.index(
      { code: 'S003', lang: 'en', type: 'skill', provider: 'rome', title: 'Cooking', description: 'Preparing meals' },
      COOKING_ID
    );
    await indexing.index(
      {
        code: 'ESCO-S123',
        lang: 'en',
        type: 'skill',
        provider: 'esco',
        title: 'Data Analysis',
        indexed_text: 'ESCO-S123 Data Analysis'
      },
      ESCO_ID
    );

    service = new SearchService({ repository, encoder, config: searchRuntimeConfig, logger });
  });

  it('fuses both branches for a hybrid query', async () => {
    const results = await service.search({ text: 'programming', searchType: 'hybrid', top: 2 });

    expect(results.map((result) => result.identifier)).toEqual([PYTHON_ID, JAVA_ID]);
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(61 / 62, 10);
    expect(results[0].competency.title).toBe('Python Programming');
  });

  it('asks each hybrid branch for the oversampled depth', async () => {
    const queryDense = jest.spyOn(repository, 'queryDense');
    const querySparse = jest.spyOn(repository, 'querySparse');

    await service.search({ text: 'programming', searchType: 'hybrid', top: 2 });

    expect(queryDense.mock.calls[0][1]).toBe(6);
    expect(querySparse.mock.calls[0][1]).toBe(6);
  });

  it('returns nothing when the filters exclude every entity', async () => {
    const results = await service.search({
      text: 'programming',
      searchType: 'hybrid',
      top: 5,
      filters: [{ field: 'lang', operator: 'eq', value: 'fr' }]
    });

    expect(results).toEqual([]);
  });

  it('finds an exact code with sparse retrieval and keeps the raw inner product', async () => {
    const results = await service.search({ text: '  ESCO-S123 ', searchType: 'sparse', top: 5 });

    expect(results).toEqual([
      {
        identifier: ESCO_ID,
        competency: {
          code: 'ESCO-S123',
          lang: 'en',
          type: 'skill',
          provider: 'esco',
          title: 'Data Analysis',
          indexed_text: 'ESCO-S123 Data Analysis'
        },
        score: 2
      }
    ]);
  });

  it('returns semantic results in non-increasing score order', async () => {
    const results = await service.search({ text: 'programming', searchType: 'semantic', top: 10 });

    expect(results).toHaveLength(4);
    expect(results.map((result) => result.identifier)).toEqual([PYTHON_ID, JAVA_ID, ESCO_ID, COOKING_ID]);
    for (let i = 1; i < results.length; i += 1) {
      expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
    }
  });

  it('applies filters inside the branch before truncation', async () => {
    const results = await service.search({
      text: 'programming',
      searchType: 'semantic',
      top: 1,
      filters: [{ field: 'provider', operator: 'eq', value: 'rome' }]
    });

    expect(results.map((result) => result.identifier)).toEqual([COOKING_ID]);
  });

  it('drops candidates whose payload disappeared before hydration', async () => {
    jest.spyOn(repository, 'getMany').mockImplementation(async (ids) => {
      const found = await InMemoryVectorRepository.prototype.getMany.call(repository, ids);
      found.delete(PYTHON_ID);
      return found;
    });

    const results = await service.search({ text: 'programming', searchType: 'hybrid', top: 2 });

    expect(results.map((result) => result.identifier)).toEqual([JAVA_ID]);
  });

  it('fails a hybrid search when either branch fails', async () => {
    jest.spyOn(repository, 'querySparse').mockRejectedValue(new Error('index corrupted'));

    const error = await service
      .search({ text: 'programming', searchType: 'hybrid', top: 2 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SearchFailure);
    expect(error).toMatchObject({
      message: 'Hybrid sparse retrieval failed: Vector store querySparse failed: index corrupted',
      details: { branch: 'sparse', failedBranches: ['sparse'] },
      retryable: true
    });
  });

  it('names the dense branch when it is the one that fails', async () => {
    jest.spyOn(repository, 'queryDense').mockRejectedValue(new Error('replica offline'));

    await expect(service.search({ text: 'programming', searchType: 'hybrid', top: 2 })).rejects.toMatchObject({
      name: 'SearchFailure',
      message: 'Hybrid dense retrieval failed: Vector store queryDense failed: replica offline',
      details: { branch: 'dense', failedBranches: ['dense'] }
    });
  });

  it('lists both branches when both fail', async () => {
    jest.spyOn(repository, 'queryDense').mockRejectedValue(new Error('replica offline'));
    jest.spyOn(repository, 'querySparse').mockRejectedValue(new Error('index corrupted'));

    await expect(service.search({ text: 'programming', searchType: 'hybrid', top: 2 })).rejects.toMatchObject({
      details: { branch: 'dense', failedBranches: ['dense', 'sparse'] }
    });
  });

  it('turns a slow store call into a storage failure', async () => {
    jest.spyOn(repository, 'queryDense').mockImplementation(() => new Promise(() => undefined));
    const impatient = new SearchService({
      repository,
      encoder,
      config: { ...searchRuntimeConfig, storageTimeoutMs: 20 },
      logger
    });

    const error = await impatient
      .search({ text: 'programming', searchType: 'semantic', top: 2 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageFailure);
    expect(error).toMatchObject({
      message: 'Vector store queryDense failed: store.queryDense timed out after 20ms.',
      retryable: true
    });
  });

  it('reports a single-branch failure as a storage failure', async () => {
    jest.spyOn(repository, 'queryDense').mockRejectedValue(new Error('timeout'));

    await expect(service.search({ text: 'programming', searchType: 'semantic', top: 2 })).rejects.toThrow(
      StorageFailure
    );
  });

  it('propagates encoder failures', async () => {
    await expect(service.search({ text: 'unscripted', searchType: 'semantic', top: 2 })).rejects.toThrow(
      EncodingFailure
    );
  });

  it.each([
    ['blank text', { text: '   ', top: 5 }],
    ['overlong text', { text: 'x'.repeat(10_001), top: 5 }],
    ['zero top', { text: 'programming', top: 0 }],
    ['top above the maximum', { text: 'programming', top: 21 }],
    ['fractional top', { text: 'programming', top: 2.5 }]
  ])('rejects %s', async (_label, request) => {
    await expect(service.search({ ...request, searchType: 'semantic' })).rejects.toThrow(ValidationError);
  });
});
