import type { Request, Response, NextFunction } from 'express';
import { ResponseUtils, type ApiResponse } from '../shared/utils/response.utils.js';
import { HttpError, UpstreamError, isRecord } from '../shared/errors.js';
import { logger } from '../utils/logger.js';

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof UpstreamError) return 502;
  // body-parser errors carry a numeric status
  if (isRecord(err)) {
    const raw = err.status ?? err.statusCode;
    if (typeof raw === 'number' && raw >= 400 && raw < 600) return raw;
  }
  return 500;
}

/** Central error handler - MUST have 4 args to be recognized by Express */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  let response: ApiResponse;
  if (err instanceof HttpError && err.validationErrors?.length) {
    response = { ok: false, error: 'Validation Error', message, meta: { errors: err.validationErrors } };
  } else if (status === 404) {
    response = ResponseUtils.notFound('resource');
  } else if (status === 429) {
    response = ResponseUtils.rateLimited(message);
  } else if (err instanceof UpstreamError) {
    response = ResponseUtils.upstreamError(message);
  } else if (status >= 500 && !(err instanceof HttpError)) {
    // Avoid leaking internal details
    response = ResponseUtils.internalError();
  } else {
    response = ResponseUtils.error(message || 'Request failed');
  }

  logger.error({
    err,
    status,
    url: req.originalUrl,
    method: req.method
  }, 'request_error');

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(status).json(response);
}
