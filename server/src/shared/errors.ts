/**
 * Error thrown by route handlers; the central error handler maps `status`
 * onto the response envelope.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly validationErrors?: string[]
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** A collaborator (market data, scraper, model provider) failed or returned garbage. */
export class UpstreamError extends Error {
  constructor(
    public readonly upstream: string,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
