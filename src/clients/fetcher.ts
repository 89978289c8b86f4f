import type { ResponseCache } from '../cache/cache.js';
import { createLogger, type Logger } from '../logger.js';
import { checksumFrom } from '../utils/hash.js';
import type { ApiRequest, ApiResponse, UpstreamClient } from './trakt.js';

/**
 * How old a cached response may be.
 * - `reuse`: any cached response will do (immutable media metadata).
 * - `refresh`: always ask upstream.
 * - `since`: only responses stored at or after `timestamp`, the time the
 *   upstream data last changed.
 */
export type Freshness = { kind: 'reuse' } | { kind: 'refresh' } | { kind: 'since'; timestamp: string };

export interface FetcherCounters {
  hits: number;
  misses: number;
  stale: number;
}

export interface CachedFetcherOptions {
  logger?: Logger | undefined;
}

export const REUSE: Freshness = { kind: 'reuse' };
export const REFRESH: Freshness = { kind: 'refresh' };

export function cacheKeyFor(request: ApiRequest): string {
  return checksumFrom({
    method: 'GET',
    path: request.path.startsWith('/') ? request.path : `/${request.path}`,
    params: request.params ?? {},
    paginated: request.paginated ?? false,
  });
}

/**
 * Write-through access to the upstream API: look up the cache, and on a miss
 * call upstream and store the response only once it succeeded.
 */
export class CachedFetcher {
  readonly counters: FetcherCounters = { hits: 0, misses: 0, stale: 0 };
  private readonly logger: Logger;

  constructor(
    private readonly client: UpstreamClient,
    private readonly cache: ResponseCache,
    options: CachedFetcherOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('fetcher');
  }

  async fetch(request: ApiRequest, freshness: Freshness = REUSE): Promise<unknown> {
    const key = cacheKeyFor(request);

    const cached = await this.lookup(key, request, freshness);
    if (cached) {
      this.counters.hits += 1;
      return cached.data;
    }

    this.counters.misses += 1;
    // Failures propagate from here; nothing is stored for them.
    const response = await this.client.get(request);
    await this.store(key, request, response);
    return response.data;
  }

  private async lookup(key: string, request: ApiRequest, freshness: Freshness): Promise<{ data: unknown } | null> {
    if (freshness.kind === 'refresh') {
      return null;
    }

    const entry = await this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (freshness.kind === 'since' && !storedSince(entry.storedAt, freshness.timestamp)) {
      this.counters.stale += 1;
      this.logger.debug(`Cached ${request.path} from ${entry.storedAt} predates ${freshness.timestamp}`);
      return null;
    }

    try {
      return { data: JSON.parse(entry.body) };
    } catch {
      this.logger.warn(`Cached response for ${request.path} is not valid JSON; refetching`);
      return null;
    }
  }

  private async store(key: string, request: ApiRequest, response: ApiResponse): Promise<void> {
    await this.cache.put(key, response.body, {
      path: request.path,
      ...(request.params ? { params: request.params } : {}),
      ...(request.paginated ? { paginated: true } : {}),
    });
  }
}

function storedSince(storedAt: string, timestamp: string): boolean {
  const stored = Date.parse(storedAt);
  const changed = Date.parse(timestamp);
  if (Number.isNaN(stored) || Number.isNaN(changed)) {
    return false;
  }
  return stored >= changed;
}
