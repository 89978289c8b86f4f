export type UpstreamErrorKind = 'rate-limit' | 'auth' | 'http' | 'network' | 'timeout' | 'protocol';

export interface UpstreamErrorOptions {
  kind: UpstreamErrorKind;
  url: string;
  status?: number | undefined;
  cause?: unknown;
}

/**
 * A request against the upstream API did not produce a usable response.
 * Never cached; aborts the run so the next scheduled invocation can retry.
 */
export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly url: string;
  readonly status: number | undefined;

  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpstreamError';
    this.kind = options.kind;
    this.url = options.url;
    this.status = options.status;
  }
}

/**
 * Describes an unreadable cache entry. The cache logs it and reports a miss;
 * it never reaches callers.
 */
export class CacheCorruptionError extends Error {
  constructor(readonly key: string, reason: string) {
    super(`Cache entry ${key} is corrupt: ${reason}`);
    this.name = 'CacheCorruptionError';
  }
}

/** Exported data broke a data-model invariant; nothing may be written. */
export class SerializationError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`Cannot serialize ${path}: ${reason}`);
    this.name = 'SerializationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}
