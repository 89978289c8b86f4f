import { UpstreamError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

export interface ApiRequest {
  path: string;
  params?: Record<string, string> | undefined;
  paginated?: boolean | undefined;
}

export interface ApiResponse {
  /** Response text as it will be cached. */
  body: string;
  data: unknown;
}

/** Anything that can answer an API request; the Trakt client or a test double. */
export interface UpstreamClient {
  get(request: ApiRequest): Promise<ApiResponse>;
}

export interface TraktClientOptions {
  clientId: string;
  accessToken: string;
  baseUrl?: string | undefined;
  pageSize?: number | undefined;
  maxRetries?: number | undefined;
  retryBackoffMs?: number | undefined;
  timeoutMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  logger?: Logger | undefined;
}

interface Page {
  text: string;
  headers: Headers;
}

const DEFAULT_BASE_URL = 'https://api.trakt.tv';
const USER_AGENT = 'trakt-snapshot/0.1.0';

export class TraktClient implements UpstreamClient {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly headers: Record<string, string>;

  constructor(options: TraktClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 1000;
    this.maxRetries = options.maxRetries ?? 5;
    this.retryBackoffMs = options.retryBackoffMs ?? 60_000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('trakt');
    this.headers = {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      'trakt-api-key': options.clientId,
      'trakt-api-version': '2',
      Authorization: `Bearer ${options.accessToken}`,
    };
  }

  async get(request: ApiRequest): Promise<ApiResponse> {
    if (request.paginated) {
      return this.getPaginated(request);
    }

    const url = this.buildUrl(request.path, request.params ?? {});
    const page = await this.fetchPage(url);
    if (page.headers.has('x-pagination-page')) {
      throw new UpstreamError(`Unexpected paginated response from ${url}`, { kind: 'protocol', url });
    }
    return { body: page.text, data: parseBody(page.text, url) };
  }

  private async getPaginated(request: ApiRequest): Promise<ApiResponse> {
    const items: unknown[] = [];
    let page = 1;
    let pageCount = 1;
    let itemCount = 0;

    while (page <= pageCount) {
      const params = { ...request.params, page: String(page), limit: String(this.pageSize) };
      const url = this.buildUrl(request.path, params);
      const response = await this.fetchPage(url);

      pageCount = readCountHeader(response.headers, 'x-pagination-page-count', url);
      itemCount = readCountHeader(response.headers, 'x-pagination-item-count', url);
      const data = parseBody(response.text, url);
      if (!Array.isArray(data)) {
        throw new UpstreamError(`Expected an array from ${url}`, { kind: 'protocol', url });
      }

      items.push(...data);
      page += 1;
    }

    if (items.length !== itemCount) {
      this.logger.warn(`${request.path} has ${items.length} items, expected ${itemCount}`);
    }

    return { body: JSON.stringify(items), data: items };
  }

  private async fetchPage(url: string): Promise<Page> {
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      this.logger.info(`GET ${url}`);
      const response = await this.send(url);

      if (response.status === 429) {
        if (attempt === this.maxRetries - 1) {
          break;
        }
        const fromHeader = Number(response.headers.get('retry-after'));
        const waitMs =
          response.headers.has('retry-after') && Number.isFinite(fromHeader)
            ? fromHeader * 1000
            : this.retryBackoffMs * (attempt + 1);
        this.logger.warn(`Hit Trakt rate limit (429). Waiting ${Math.round(waitMs / 1000)}s before retry #${attempt + 1}.`);
        await this.sleep(waitMs);
        continue;
      }

      if (response.status === 401 || response.status === 403) {
        throw new UpstreamError(`Trakt rejected the credentials (${response.status}) for ${url}`, {
          kind: 'auth',
          url,
          status: response.status,
        });
      }

      if (!response.ok) {
        throw new UpstreamError(`Trakt request failed with status ${response.status} for ${url}`, {
          kind: 'http',
          url,
          status: response.status,
        });
      }

      return { text: await this.readBody(response, url), headers: response.headers };
    }

    throw new UpstreamError(`Exceeded retry budget for ${url}`, { kind: 'rate-limit', url, status: 429 });
  }

  private async send(url: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        headers: this.headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new UpstreamError(timedOut ? `Timed out after ${this.timeoutMs}ms: ${url}` : `Network error for ${url}`, {
        kind: timedOut ? 'timeout' : 'network',
        url,
        cause: error,
      });
    }
  }

  private async readBody(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      throw new UpstreamError(timedOut ? `Timed out reading ${url}` : `Connection lost while reading ${url}`, {
        kind: timedOut ? 'timeout' : 'network',
        url,
        cause: error,
      });
    }
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const normalized = path.startsWith('/') ? path : `/${path}`;
    const query = new URLSearchParams(params).toString();
    return `${this.baseUrl}${normalized}${query ? `?${query}` : ''}`;
  }
}

function parseBody(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UpstreamError(`Malformed JSON from ${url}`, { kind: 'protocol', url, cause: error });
  }
}

function readCountHeader(headers: Headers, name: string, url: string): number {
  const value = Number(headers.get(name));
  if (!headers.has(name) || !Number.isInteger(value) || value < 0) {
    throw new UpstreamError(`Missing or invalid ${name} header from ${url}`, { kind: 'protocol', url });
  }
  return value;
}
