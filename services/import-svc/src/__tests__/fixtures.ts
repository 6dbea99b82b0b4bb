import type { Logger } from 'pino';

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

export const escoRecord = {
  preferredLabel: 'manage musical staff',
  description: 'Assign and manage staff tasks.',
  conceptUri: 'http://data.europa.eu/esco/skill/0001',
  altLabels: 'coordinate duties of musical staff\nmanage staff of music',
  hiddenLabels: null,
  broaderConceptPT: 'Musical activities | Staff management'
};

export function competency(overrides: Partial<Competency> = {}): Competency {
  return {
    code: 'X-1',
    lang: 'en',
    type: 'occupation',
    provider: 'esco',
    title: 'Cook',
    description: 'Prepares meals.',
    category: '',
    keywords: ['Chef', '  ', 'Kitchen hand'],
    ...overrides
  };
}
