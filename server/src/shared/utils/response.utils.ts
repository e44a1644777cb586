/**
 * Shared response utilities for consistent API responses
 */

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  message?: string;
  meta?: Record<string, unknown>;
}

export class ResponseUtils {
  public static success<T>(data: T, message?: string, meta?: Record<string, unknown>): ApiResponse<T> {
    return {
      ok: true,
      data,
      message,
      meta
    };
  }

  public static error(error: string | Error, message?: string): ApiResponse {
    return {
      ok: false,
      error: error instanceof Error ? error.message : error,
      message
    };
  }

  public static notFound(resource: string): ApiResponse {
    return {
      ok: false,
      error: `${resource} not found`,
      message: `The requested ${resource} could not be found`
    };
  }

  public static rateLimited(message = 'Rate limit exceeded'): ApiResponse {
    return {
      ok: false,
      error: 'Rate limit exceeded',
      message
    };
  }

  public static upstreamError(message = 'Upstream provider failed'): ApiResponse {
    return {
      ok: false,
      error: 'Upstream error',
      message
    };
  }

  public static internalError(message = 'Internal server error'): ApiResponse {
    return {
      ok: false,
      error: 'Internal server error',
      message
    };
  }
}
