import { ServiceError, StorageFailure, describeError, withTimeout, type HealthStatus } from '@competency-search/common';

import type { CompiledPredicate } from './filter-translator';
import type { Competency, DenseVector, ScoredPoint, SparseVector } from './types';

export interface RepositoryHealth extends HealthStatus {
  totalEntities: number;
}

/**
 * Dual-vector store. Predicates are evaluated inside the store so `k` counts
 * post-filter rows. Equal scores are ordered by identifier.
 */
export interface VectorRepository {
  readonly driver: string;
  verify(): Promise<void>;
  upsert(id: string, dense: DenseVector, sparse: SparseVector, payload: Competency): Promise<void>;
  delete(id: string): Promise<boolean>;
  get(id: string): Promise<Competency | null>;
  getMany(ids: readonly string[]): Promise<Map<string, Competency>>;
  queryDense(vector: DenseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]>;
  querySparse(vector: SparseVector, k: number, predicate: CompiledPredicate): Promise<ScoredPoint[]>;
  healthCheck(): Promise<RepositoryHealth>;
  close(): Promise<void>;
}

/** Cosine similarity is undefined for a vector without magnitude. */
export function isZeroVector(vector: DenseVector): boolean {
  return vector.every((value) => value === 0);
}

export function compareScoredPoints(left: ScoredPoint, right: ScoredPoint): number {
  if (right.score !== left.score) {
    return right.score - left.score;
  }
  return left.id < right.id ? -1 : left.id > right.id ? 1 : 0;
}

/**
 * Bounds a repository call by a timeout and surfaces anything that is not
 * already a typed service error as a retryable `StorageFailure`.
 */
export async function guardStorage<T>(operation: string, timeoutMs: number, action: () => Promise<T>): Promise<T> {
  try {
    return await withTimeout(`store.${operation}`, timeoutMs, action);
  } catch (error) {
    if (error instanceof ServiceError) {
      throw error;
    }
    throw new StorageFailure(`Vector store ${operation} failed: ${describeError(error)}`, { cause: error });
  }
}
