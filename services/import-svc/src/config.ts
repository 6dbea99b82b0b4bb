import {
  ConfigurationError,
  getConfig as getBaseConfig,
  normalizeUrl,
  parseNumber,
  type ServiceConfig
} from '@competency-search/common';

export interface SearchEngineConfig {
  baseUrl: string;
  timeoutMs: number;
}

export interface ImportServiceConfig {
  base: ServiceConfig;
  searchEngine: SearchEngineConfig;
}

let cachedConfig: ImportServiceConfig | null = null;

export function getImportServiceConfig(): ImportServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const searchEngine: SearchEngineConfig = {
    baseUrl: normalizeUrl(process.env.SEARCH_ENGINE_URL, 'http://localhost:8080'),
    timeoutMs: parseNumber(process.env.SEARCH_ENGINE_TIMEOUT_MS, 60_000)
  };

  if (!/^https?:\/\//.test(searchEngine.baseUrl)) {
    throw new ConfigurationError(`SEARCH_ENGINE_URL must be an http(s) URL, received "${searchEngine.baseUrl}".`);
  }
  if (searchEngine.timeoutMs <= 0) {
    throw new ConfigurationError('SEARCH_ENGINE_TIMEOUT_MS must be positive.');
  }

  cachedConfig = { base: getBaseConfig(), searchEngine };
  return cachedConfig;
}

export function resetImportServiceConfig(): void {
  cachedConfig = null;
}
