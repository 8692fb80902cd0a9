/**
 * List Fetcher - Downloads or reads the source filter lists
 *
 * A list that cannot be retrieved yields `content: null` with an error
 * message; it never aborts the other lists.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { FetchedList } from './types';
import type { RunLogger } from './run-logger';
import { errorMessage } from './errors';

export interface ListSource {
  name: string;
  /** http(s) URL, or a local path resolved against `baseDir` */
  location: string;
}

export interface ListFetcherOptions {
  maxParallel: number;
  timeoutMs: number;
  /** Retries after the first attempt */
  retries: number;
  /** Backoff before retry n is `retryDelayMs * 2^(n-1)` */
  retryDelayMs: number;
  baseDir: string;
}

export const DEFAULT_FETCHER_OPTIONS: ListFetcherOptions = {
  maxParallel: 5,
  timeoutMs: 30000,
  retries: 2,
  retryDelayMs: 1000,
  baseDir: '.'
};

// Client errors that will not change on retry
const NO_RETRY_STATUSES = new Set([403, 404]);

type Attempt =
  | { ok: true; content: string }
  | { ok: false; error: string; retryable: boolean };

export class ListFetcher {
  private options: ListFetcherOptions;

  constructor(options: Partial<ListFetcherOptions> = {}, private logger?: RunLogger) {
    this.options = {
      maxParallel: options.maxParallel ?? DEFAULT_FETCHER_OPTIONS.maxParallel,
      timeoutMs: options.timeoutMs ?? DEFAULT_FETCHER_OPTIONS.timeoutMs,
      retries: options.retries ?? DEFAULT_FETCHER_OPTIONS.retries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_FETCHER_OPTIONS.retryDelayMs,
      baseDir: options.baseDir ?? DEFAULT_FETCHER_OPTIONS.baseDir
    };
  }

  /**
   * Retrieve every list with at most `maxParallel` in flight.
   * Results are returned in source order.
   */
  async fetchAll(sources: ListSource[]): Promise<FetchedList[]> {
    if (sources.length === 0) {
      this.logger?.warn('No filter lists configured');
      return [];
    }

    const results: FetchedList[] = new Array(sources.length);
    let next = 0;
    const lane = async (): Promise<void> => {
      while (next < sources.length) {
        const index = next++;
        results[index] = await this.fetchOne(sources[index]);
      }
    };

    const lanes = Math.max(1, Math.min(this.options.maxParallel, sources.length));
    await Promise.all(Array.from({ length: lanes }, () => lane()));

    const failed = results.filter(result => result.content === null).length;
    this.logger?.info('Fetched filter lists', { lists: sources.length, failed });
    return results;
  }

  async fetchOne(source: ListSource): Promise<FetchedList> {
    if (!isRemote(source.location)) {
      return this.readLocal(source);
    }

    const maxAttempts = this.options.retries + 1;
    let last: Attempt = { ok: false, error: 'not attempted', retryable: false };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.logger?.debug('Downloading list', { list: source.name, url: source.location, attempt, maxAttempts });
      last = await this.download(source.location);
      if (last.ok) {
        this.logger?.info('Downloaded list', { list: source.name, bytes: last.content.length });
        return { name: source.name, location: source.location, content: last.content };
      }

      this.logger?.warn('List download failed', { list: source.name, attempt, error: last.error });
      if (!last.retryable || attempt === maxAttempts) {
        break;
      }
      await delay(this.options.retryDelayMs * Math.pow(2, attempt - 1));
    }

    const error = last.ok ? 'unknown download failure' : last.error;
    this.logger?.error('Giving up on list', { list: source.name, error });
    return { name: source.name, location: source.location, content: null, error };
  }

  private async download(url: string): Promise<Attempt> {
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
      if (!response.ok) {
        return {
          ok: false,
          error: `HTTP ${response.status} ${response.statusText}`.trim(),
          retryable: !NO_RETRY_STATUSES.has(response.status)
        };
      }
      return { ok: true, content: await response.text() };
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { ok: false, error: `Request timeout after ${this.options.timeoutMs}ms`, retryable: true };
      }
      return { ok: false, error: errorMessage(error), retryable: true };
    }
  }

  private readLocal(source: ListSource): FetchedList {
    const filePath = path.resolve(this.options.baseDir, source.location);
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      this.logger?.info('Read local list', { list: source.name, path: filePath });
      return { name: source.name, location: source.location, content };
    } catch (error) {
      const message = `Cannot read file: ${errorMessage(error)}`;
      this.logger?.error('Giving up on list', { list: source.name, error: message });
      return { name: source.name, location: source.location, content: null, error: message };
    }
  }
}

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
