import { ConfigurationError } from '@competency-search/common';
import type { Logger } from 'pino';

import { matchesPredicate, type CompiledPredicate } from './filter-translator';
import type { Competency, DenseVector, ScoredPoint, SparseVector, StoredPoint } from './types';
import { compareScoredPoints, isZeroVector, type RepositoryHealth, type VectorRepository } from './vector-repository';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}

/** Inner product of two index-sorted sparse vectors. */
export function sparseDot(a: SparseVector, b: SparseVector): number {
  let i = 0;
  let j = 0;
  let total = 0;

  while (i < a.indices.length && j < b.indices.length) {
    if (a.indices[i] === b.indices[j]) {
      total += a.values[i] * b.values[j];
      i += 1;
      j += 1;
    } else if (a.indices[i] < b.indices[j]) {
      i += 1;
    } else {
      j += 1;
    }
  }

  return total;
}

function clonePayload(payload: Competency): Competency {
  return structuredClone(payload);
}

/**
 * Process-local store used for development and tests. Same contract as the
 * pgvector repository: cosine for dense, inner product with overlap for sparse.
 */
export class InMemoryVectorRepository implements VectorRepository {
  readonly driver = 'memory';
  private readonly points = new Map<string, StoredPoint>();

  constructor(private readonly denseDimensions: number, private readonly logger?: Logger) {}

  async verify(): Promise<void> {
    if (!Number.isInteger(this.denseDimensions) || this.denseDimensions <= 0) {
      throw new ConfigurationError(`Invalid dense dimension ${this.denseDimensions}.`);
    }
    this.logger?.info({ denseDimensions: this.denseDimensions }, 'In-memory vector store ready.');
  }

  async upsert(id: string, dense: DenseVector, sparse: SparseVector, payload: Competency): Promise<void> {
    if (dense.length !== this.denseDimensions) {
      throw new Error(`Expected ${this.denseDimensions} dense dimensions, received ${dense.length}.`);
    }

    this.points.set(id, {
      id,
      dense: [...dense],
      sparse: { indices: [...sparse.indices], values: [...sparse.values] },
      payload: clonePayload(payload)
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.points.delete(id);
  }

  async get(id: string): Promise<Competency | null> {
    const point = this.points.get(id);
    return point ? clonePayload(point.payload) : null;
  }

  async getMany(ids: readonly string[]): Promise<Map<string, Competency>> {
    const found = new Map<string, Competency>();
    for (const id of ids) {
      const point = this.points.get(id);
      if (point) {
        found.set(id, clonePayload(point.payload));
      }
    }
    return found;
  }

  async queryDense(vector: DenseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]> {
    if (isZeroVector(vector)) {
      return [];
    }
    return this.rank(k, predicate, (point) => (isZeroVector(point.dense) ? null : cosineSimilarity(point.dense, vector)));
  }

  async querySparse(vector: SparseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]> {
    return this.rank(k, predicate, (point) => {
      const score = sparseDot(point.sparse, vector);
      return score > 0 ? score : null;
    });
  }

  async healthCheck(): Promise<RepositoryHealth> {
    return { status: 'healthy', totalEntities: this.points.size };
  }

  async close(): Promise<void> {
    this.points.clear();
  }

  private rank(k: number, predicate: CompiledPredicate, score: (point: StoredPoint) => number | null): ScoredPoint[] {
    if (k <= 0 || predicate.kind === 'matchNothing') {
      return [];
    }

    const scored: ScoredPoint[] = [];
    for (const point of this.points.values()) {
      if (!matchesPredicate(point.payload, predicate)) {
        continue;
      }
      const value = score(point);
      if (value !== null) {
        scored.push({ id: point.id, score: value });
      }
    }

    return scored.sort(compareScoredPoints).slice(0, k);
  }
}
