export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
  port: number;
  host: string;
}

export interface MonitoringConfig {
  requestIdHeader: string;
}

export interface ServiceConfig {
  env: string;
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

let cachedConfig: ServiceConfig | null = null;

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function normalizeUrl(value: string | undefined, fallback: string): string {
  const resolved = value && value.trim().length > 0 ? value.trim() : fallback;
  return resolved.endsWith('/') ? resolved.slice(0, -1) : resolved;
}

export function loadConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    env: process.env.NODE_ENV ?? 'development',
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'competency-service',
      logLevel: process.env.LOG_LEVEL ?? 'info',
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true),
      port: parseNumber(process.env.PORT, 8080),
      host: process.env.HOST ?? '0.0.0.0'
    },
    monitoring: {
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID'
    }
  };

  return cachedConfig;
}

export function getConfig(): ServiceConfig {
  return cachedConfig ?? loadConfig();
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
