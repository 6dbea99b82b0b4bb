import type { FastifySchema } from 'fastify';

import { COMPETENCY_TYPES, INDEXING_FIELDS, INDEXING_STRATEGIES, LANGUAGES, PROVIDERS } from './types';

const errorResponseSchema = {
  type: 'object',
  required: ['code', 'message'],
  properties: {
    code: { type: 'string' },
    message: { type: 'string' },
    retryable: { type: 'boolean' },
    details: { type: 'object', additionalProperties: true }
  }
} as const;

const importSummarySchema = {
  type: 'object',
  required: ['imported', 'identifiers'],
  properties: {
    imported: { type: 'integer' },
    identifiers: { type: 'array', items: { type: 'string' } }
  }
} as const;

const importOptionsProperties = {
  provider: { type: 'string', enum: [...PROVIDERS] },
  competency_type: { type: 'string', enum: [...COMPETENCY_TYPES] },
  lang: { type: 'string', enum: [...LANGUAGES], default: 'fr' },
  indexing_strategy: { type: 'string', enum: [...INDEXING_STRATEGIES], default: 'field_duplication' },
  fields_to_index: {
    type: 'array',
    items: { type: 'string', enum: [...INDEXING_FIELDS] }
  }
} as const;

const rawRecordSchema = { type: 'object', additionalProperties: true } as const;

const importResponses = {
  201: importSummarySchema,
  400: errorResponseSchema,
  502: errorResponseSchema
} as const;

export const importRecordSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['provider', 'competency_type', 'data'],
    properties: {
      ...importOptionsProperties,
      data: rawRecordSchema
    }
  },
  response: importResponses
};

export const importBatchSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['provider', 'competency_type', 'items'],
    properties: {
      ...importOptionsProperties,
      items: { type: 'array', items: rawRecordSchema }
    }
  },
  response: importResponses
};
