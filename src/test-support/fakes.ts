import type { ApiRequest, ApiResponse, UpstreamClient } from '../clients/trakt.js';
import { UpstreamError } from '../errors.js';

export interface RecordedFetch {
  impl: typeof fetch;
  urls: string[];
  inits: (RequestInit | undefined)[];
}

/** A `fetch` that answers with the queued responses in order. */
export function queuedFetch(responses: Response[]): RecordedFetch {
  const urls: string[] = [];
  const inits: (RequestInit | undefined)[] = [];
  const impl: typeof fetch = async (input, init) => {
    urls.push(String(input));
    inits.push(init);
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${String(input)}`);
    }
    return next;
  };
  return { impl, urls, inits };
}

export function jsonResponse(data: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(data), {
    status: init.status ?? 200,
    headers: { 'content-type': 'application/json', ...init.headers },
  });
}

/**
 * Serves canned JSON per request path and counts calls. Paths missing from the
 * table fail like a 404 from upstream.
 */
export class FakeUpstream implements UpstreamClient {
  readonly calls: ApiRequest[] = [];
  private failure: Error | null = null;

  constructor(private routes: Record<string, unknown>) {}

  setRoute(path: string, data: unknown): void {
    this.routes = { ...this.routes, [path]: data };
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }

  async get(request: ApiRequest): Promise<ApiResponse> {
    this.calls.push(request);
    if (this.failure) {
      throw this.failure;
    }
    if (!(request.path in this.routes)) {
      throw new UpstreamError(`No route for ${request.path}`, { kind: 'http', url: request.path, status: 404 });
    }
    const data = this.routes[request.path];
    return { body: JSON.stringify(data), data: JSON.parse(JSON.stringify(data)) };
  }
}
