import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { badGatewayError, describeError, ServiceError } from '@competency-search/common';

import type { SearchEngineConfig } from './config';
import type { Competency, Entity } from './types';

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data ?? '');
}

function isEntity(value: unknown): value is Entity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'identifier' in value &&
    typeof value.identifier === 'string' &&
    'competency' in value &&
    typeof value.competency === 'object'
  );
}

/** Forwards mapped competencies to the search service `POST /entities`. */
export class SearchEngineClient {
  private readonly http: AxiosInstance;

  constructor(config: SearchEngineConfig, private readonly logger: Logger) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json'
      }
    });
  }

  async createEntity(competency: Competency): Promise<Entity> {
    try {
      const response = await this.http.post<unknown>('/entities', { competency });
      if (!isEntity(response.data)) {
        throw badGatewayError('Search engine returned an unexpected entity payload.');
      }
      return response.data;
    } catch (error) {
      throw this.translateError(error);
    }
  }

  private translateError(error: unknown): ServiceError {
    if (error instanceof ServiceError) {
      return error;
    }

    if (axios.isAxiosError(error) && error.response) {
      const { status, data } = error.response;
      this.logger.warn({ status }, 'Search engine rejected competency.');
      return new ServiceError(`Search engine error ${status}: ${describeBody(data)}`, {
        statusCode: status,
        code: 'upstream_error',
        retryable: status >= 500,
        cause: error
      });
    }

    this.logger.error({ error }, 'Search engine unreachable.');
    return badGatewayError(`Error connecting to search engine: ${describeError(error)}`);
  }
}
