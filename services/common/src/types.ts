export interface RequestContext {
  requestId: string;
}

export interface ErrorResponse {
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}
