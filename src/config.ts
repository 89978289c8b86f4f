import path from 'node:path';
import { defaultCacheDir } from './cache/fileCache.js';
import { ConfigError } from './errors.js';
import { parseByteSize } from './utils/size.js';
import { parseDuration } from './utils/time.js';

export type Env = Record<string, string | undefined>;

export const DEFAULT_CACHE_LIMIT = '512MB';
export const DEFAULT_CACHE_MIN_AGE = '1d';

export interface TraktCredentials {
  clientId: string;
  accessToken: string;
}

export interface CacheSettings {
  cacheDir: string;
  /** Byte bound for pruning, or null when pruning is off. */
  limitBytes: number | null;
  minAgeMs: number;
}

/** Raw CLI flags as commander hands them over. */
export interface RawOptions {
  traktClientId?: string | undefined;
  traktAccessToken?: string | undefined;
  outputDir?: string | undefined;
  exclude?: string[] | undefined;
  cacheDir?: string | undefined;
  cacheLimit?: string | undefined;
  cacheMinAge?: string | undefined;
  liveChecksumUrl?: string | undefined;
}

export interface SyncConfig {
  credentials: TraktCredentials;
  outputDir: string;
  exclude: string[];
  cache: CacheSettings;
  liveChecksumUrl: string | null;
}

export function resolveCredentials(raw: RawOptions, env: Env): TraktCredentials {
  const clientId = firstNonEmpty(raw.traktClientId, env.TRAKT_CLIENT_ID);
  const accessToken = firstNonEmpty(raw.traktAccessToken, env.TRAKT_ACCESS_TOKEN);
  if (!clientId) {
    throw new ConfigError('TRAKT_CLIENT_ID is missing (or pass --trakt-client-id).');
  }
  if (!accessToken) {
    throw new ConfigError('TRAKT_ACCESS_TOKEN is missing (or pass --trakt-access-token).');
  }
  return { clientId, accessToken };
}

export function resolveOutputDir(raw: RawOptions, env: Env): string {
  const outputDir = firstNonEmpty(raw.outputDir, env.OUTPUT_DIR);
  if (!outputDir) {
    throw new ConfigError('OUTPUT_DIR is missing (or pass --output-dir).');
  }
  return path.resolve(outputDir);
}

export function resolveExclude(raw: RawOptions, env: Env): string[] {
  const values = raw.exclude && raw.exclude.length > 0 ? raw.exclude : parseCommaList(env.TRAKT_DATA_EXCLUDE);
  return values.flatMap((value) => parseCommaList(value));
}

/**
 * Cache location and pruning bounds. `limitFallback` applies when neither a
 * flag nor TRAKT_DATA_CACHE_LIMIT gives a limit; null turns pruning off.
 */
export function resolveCacheSettings(raw: RawOptions, env: Env, limitFallback: string | null = null): CacheSettings {
  const cacheDir = firstNonEmpty(raw.cacheDir, env.TRAKT_DATA_CACHE_DIR);
  const limit = firstNonEmpty(raw.cacheLimit, env.TRAKT_DATA_CACHE_LIMIT) ?? limitFallback;
  const minAge = firstNonEmpty(raw.cacheMinAge, env.TRAKT_DATA_CACHE_MIN_AGE) ?? DEFAULT_CACHE_MIN_AGE;

  return {
    cacheDir: cacheDir ? path.resolve(cacheDir) : defaultCacheDir(env),
    limitBytes: limit === null ? null : parseSetting('TRAKT_DATA_CACHE_LIMIT', limit, parseByteSize),
    minAgeMs: parseSetting('TRAKT_DATA_CACHE_MIN_AGE', minAge, parseDuration),
  };
}

export function resolveLiveChecksumUrl(raw: RawOptions, env: Env): string | null {
  const value = firstNonEmpty(raw.liveChecksumUrl, env.LIVE_CHECKSUM_URL);
  if (!value) {
    return null;
  }
  if (!URL.canParse(value)) {
    throw new ConfigError(`LIVE_CHECKSUM_URL is not a valid URL: ${value}`);
  }
  return value;
}

export function resolveSyncConfig(raw: RawOptions, env: Env): SyncConfig {
  return {
    credentials: resolveCredentials(raw, env),
    outputDir: resolveOutputDir(raw, env),
    exclude: resolveExclude(raw, env),
    cache: resolveCacheSettings(raw, env),
    liveChecksumUrl: resolveLiveChecksumUrl(raw, env),
  };
}

function parseSetting<T>(name: string, value: string, parse: (value: string) => T): T {
  try {
    return parse(value);
  } catch (error) {
    throw new ConfigError(`${name}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

function parseCommaList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const rawPart of value.split(',')) {
    const trimmed = rawPart.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    parts.push(trimmed);
  }
  return parts;
}
