import { logger } from '../utils/logger.js';

export type LazyState = 'uninitialized' | 'loading' | 'ready' | 'failed';

/**
 * Loads a heavyweight dependency on first use. Concurrent first callers share
 * one load; a failed load is retried by the next caller.
 */
export class LazyResource<T> {
  private state: LazyState = 'uninitialized';
  private pending: Promise<T> | null = null;
  private value: T | undefined;

  constructor(private readonly name: string, private readonly loader: () => Promise<T>) {}

  get status(): LazyState {
    return this.state;
  }

  get(): Promise<T> {
    if (this.state === 'ready' && this.value !== undefined) return Promise.resolve(this.value);
    if (this.pending) return this.pending;
    this.state = 'loading';
    const started = Date.now();
    this.pending = this.loader().then(
      (value) => {
        this.value = value;
        this.state = 'ready';
        this.pending = null;
        logger.info({ resource: this.name, ms: Date.now() - started }, 'lazy_resource_ready');
        return value;
      },
      (err: unknown) => {
        this.state = 'failed';
        this.pending = null;
        logger.error({ resource: this.name, err }, 'lazy_resource_failed');
        throw err;
      }
    );
    return this.pending;
  }
}
