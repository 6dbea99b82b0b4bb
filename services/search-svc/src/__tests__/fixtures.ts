import type { Logger } from 'pino';

import type { SearchRuntimeConfig } from '../config';
import { createEmbeddingProviders } from '../embedding-provider';
import { ProviderEncodingService } from '../encoding-service';
import type { Competency } from '../types';

export interface MockLogger {
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
  debug: jest.Mock;
  child: () => MockLogger;
}

export function createMockLogger(): { mock: MockLogger; logger: Logger } {
  const mock: MockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    child: () => mock
  };
  return { mock, logger: mock as unknown as Logger };
}

export const TEST_DENSE_DIMENSIONS = 64;
export const TEST_SPARSE_DIMENSIONS = 4096;

export const searchRuntimeConfig: SearchRuntimeConfig = {
  oversampleFactor: 3,
  rrfK: 60,
  maxTop: 20,
  storageTimeoutMs: 1000
};

export function createLocalEncoder(logger: Logger): ProviderEncodingService {
  const encoderConfig = {
    provider: 'local' as const,
    denseUrl: 'http://localhost:8082',
    sparseUrl: 'http://localhost:8083',
    timeoutMs: 1000,
    maxCharacters: 3000,
    denseDimensions: TEST_DENSE_DIMENSIONS,
    sparseDimensions: TEST_SPARSE_DIMENSIONS
  };
  return new ProviderEncodingService(createEmbeddingProviders(encoderConfig, logger), encoderConfig, logger);
}

export function competency(overrides: Partial<Competency> = {}): Competency {
  return {
    code: 'S001',
    lang: 'en',
    type: 'skill',
    provider: 'esco',
    title: 'Python Programming',
    description: 'Writing software in Python',
    ...overrides
  };
}

export const PYTHON_ID = '00000000-0000-4000-8000-000000000001';
export const JAVA_ID = '00000000-0000-4000-8000-000000000002';
export const COOKING_ID = '00000000-0000-4000-8000-000000000003';
