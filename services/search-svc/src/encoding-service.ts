import { ConfigurationError, EncodingFailure, describeError, withTimeout } from '@competency-search/common';
import type { Logger } from 'pino';

import type { EncoderConfig } from './config';
import type { EmbeddingProviders } from './embedding-provider';
import type { DenseVector, SparseVector } from './types';

const DIMENSION_CHECK_TEXT = 'competency';

export interface EncodingService {
  readonly denseDimensions: number;
  encodeDense(text: string): Promise<DenseVector>;
  encodeSparse(text: string): Promise<SparseVector>;
}

/**
 * Applies the encoding policy around the raw providers: silent truncation,
 * a timeout on every call, output shape checks and `EncodingFailure` mapping.
 */
export class ProviderEncodingService implements EncodingService {
  readonly denseDimensions: number;

  constructor(
    private readonly providers: EmbeddingProviders,
    private readonly config: Pick<EncoderConfig, 'timeoutMs' | 'maxCharacters' | 'denseDimensions' | 'sparseDimensions'>,
    private readonly logger: Logger
  ) {
    this.denseDimensions = config.denseDimensions;
  }

  truncate(text: string): string {
    return text.length > this.config.maxCharacters ? text.slice(0, this.config.maxCharacters) : text;
  }

  async encodeDense(text: string): Promise<DenseVector> {
    const vector = await this.run('dense', () => this.providers.dense.embed(this.truncate(text)));

    if (vector.length !== this.config.denseDimensions || !vector.every(Number.isFinite)) {
      throw new EncodingFailure(
        `Dense encoder returned ${vector.length} dimensions, expected ${this.config.denseDimensions}.`,
        { details: { model: this.providers.dense.model } }
      );
    }

    return vector;
  }

  /** Encodes a fixed sample once; a dense model of the wrong width is a configuration error. */
  async verifyDimensions(): Promise<void> {
    const sample = await this.run('dense', () => this.providers.dense.embed(DIMENSION_CHECK_TEXT));
    if (sample.length !== this.config.denseDimensions) {
      throw new ConfigurationError(
        `Dense encoder ${this.providers.dense.model} produces ${sample.length} dimensions, DENSE_DIMENSIONS is ${this.config.denseDimensions}.`
      );
    }
  }

  async encodeSparse(text: string): Promise<SparseVector> {
    const raw = await this.run('sparse', () => this.providers.sparse.embed(this.truncate(text)));
    return this.normalizeSparse(raw);
  }

  /** Merges duplicate indices, drops non-positive weights and sorts by index. */
  private normalizeSparse(raw: SparseVector): SparseVector {
    if (raw.indices.length !== raw.values.length) {
      throw new EncodingFailure('Sparse encoder returned mismatched indices and values.');
    }

    const merged = new Map<number, number>();
    raw.indices.forEach((index, position) => {
      merged.set(index, (merged.get(index) ?? 0) + raw.values[position]);
    });

    const indices: number[] = [];
    const values: number[] = [];
    for (const index of [...merged.keys()].sort((a, b) => a - b)) {
      const value = merged.get(index) ?? 0;
      if (!Number.isInteger(index) || index < 0 || index >= this.config.sparseDimensions) {
        throw new EncodingFailure(`Sparse index ${index} is outside [0, ${this.config.sparseDimensions}).`);
      }
      if (Number.isFinite(value) && value > 0) {
        indices.push(index);
        values.push(value);
      }
    }

    return { indices, values };
  }

  private async run<T>(kind: 'dense' | 'sparse', action: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`encode.${kind}`, this.config.timeoutMs, action);
    } catch (error) {
      if (error instanceof EncodingFailure) {
        throw error;
      }
      this.logger.warn({ error, kind }, 'Encoding call failed.');
      throw new EncodingFailure(`${kind === 'dense' ? 'Dense' : 'Sparse'} encoding failed: ${describeError(error)}`, {
        cause: error
      });
    }
  }
}
