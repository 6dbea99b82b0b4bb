import type { FastifySchema } from 'fastify';

import { MAX_SEARCH_TEXT_LENGTH } from './search-service';
import { FILTER_OPERATORS, SEARCH_TYPES } from './types';

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

const competencyResponseSchema = {
  type: 'object',
  additionalProperties: true,
  properties: {
    code: { type: 'string' },
    lang: { type: 'string' },
    type: { type: 'string' },
    provider: { type: 'string' },
    title: { type: 'string' },
    url: { type: 'string' },
    category: { type: 'string' },
    description: { type: 'string' },
    keywords: { type: 'array', items: { type: 'string' } },
    indexed_text: { type: 'string' },
    metadata: { type: 'object', additionalProperties: true }
  }
} as const;

const entityResponseSchema = {
  type: 'object',
  required: ['identifier', 'competency'],
  properties: {
    identifier: { type: 'string' },
    competency: competencyResponseSchema
  }
} as const;

const identifierParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', format: 'uuid' }
  }
} as const;

// Field-level validation of the competency happens in the indexing service.
const competencyBodySchema = { type: 'object', additionalProperties: true } as const;

export const createEntitySchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['competency'],
    properties: {
      identifier: { type: 'string', format: 'uuid' },
      competency: competencyBodySchema
    }
  },
  response: {
    201: entityResponseSchema,
    400: errorResponseSchema
  }
};

export const getEntitySchema: FastifySchema = {
  params: identifierParamsSchema,
  response: {
    200: entityResponseSchema,
    404: errorResponseSchema
  }
};

export const updateEntitySchema: FastifySchema = {
  params: identifierParamsSchema,
  body: {
    type: 'object',
    required: ['competency'],
    properties: {
      competency: competencyBodySchema
    }
  },
  response: {
    200: entityResponseSchema,
    400: errorResponseSchema,
    404: errorResponseSchema
  }
};

export const deleteEntitySchema: FastifySchema = {
  params: identifierParamsSchema,
  response: {
    404: errorResponseSchema
  }
};

export const textSearchSchema: FastifySchema = {
  body: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string', minLength: 1, maxLength: MAX_SEARCH_TEXT_LENGTH },
      search_type: { type: 'string', enum: [...SEARCH_TYPES], default: 'semantic' },
      top: { type: 'integer', minimum: 1, default: 10 },
      filters: {
        type: 'array',
        default: [],
        items: {
          type: 'object',
          required: ['field', 'operator', 'value'],
          properties: {
            field: { type: 'string', minLength: 1 },
            operator: { type: 'string', enum: [...FILTER_OPERATORS] },
            value: {}
          }
        }
      }
    }
  },
  response: {
    200: {
      type: 'object',
      required: ['results'],
      properties: {
        results: {
          type: 'array',
          items: {
            type: 'object',
            required: ['identifier', 'competency', 'score'],
            properties: {
              identifier: { type: 'string' },
              competency: competencyResponseSchema,
              score: { type: 'number' }
            }
          }
        }
      }
    },
    400: errorResponseSchema
  }
};
