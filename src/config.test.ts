import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  resolveCacheSettings,
  resolveCredentials,
  resolveExclude,
  resolveLiveChecksumUrl,
  resolveOutputDir,
  resolveSyncConfig,
} from './config.js';
import { ConfigError } from './errors.js';

describe('resolveCredentials', () => {
  it('prefers flags over the environment', () => {
    expect(
      resolveCredentials(
        { traktClientId: 'flag-id' },
        { TRAKT_CLIENT_ID: 'env-id', TRAKT_ACCESS_TOKEN: 'test-token' },
      ),
    ).toEqual({ clientId: 'flag-id', accessToken: 'test-token' });
  });

  it('fails when a credential is missing or blank', () => {
    expect(() => resolveCredentials({}, { TRAKT_ACCESS_TOKEN: 'test-token' })).toThrow(ConfigError);
    expect(() => resolveCredentials({}, { TRAKT_CLIENT_ID: 'test-id', TRAKT_ACCESS_TOKEN: '  ' })).toThrow(
      'TRAKT_ACCESS_TOKEN is missing',
    );
  });
});

describe('resolveOutputDir', () => {
  it('resolves to an absolute path', () => {
    expect(resolveOutputDir({}, { OUTPUT_DIR: 'data' })).toBe(path.resolve('data'));
  });

  it('is required', () => {
    expect(() => resolveOutputDir({}, {})).toThrow('OUTPUT_DIR is missing');
  });
});

describe('resolveExclude', () => {
  it('splits the environment list and drops blanks and duplicates', () => {
    expect(resolveExclude({}, { TRAKT_DATA_EXCLUDE: 'lists, hidden/hidden-calendar.json,,lists' })).toEqual([
      'lists',
      'hidden/hidden-calendar.json',
    ]);
  });

  it('lets repeated flags replace the environment', () => {
    expect(resolveExclude({ exclude: ['user', 'comments,likes'] }, { TRAKT_DATA_EXCLUDE: 'lists' })).toEqual([
      'user',
      'comments',
      'likes',
    ]);
  });
});

describe('resolveCacheSettings', () => {
  it('parses limits and ages', () => {
    expect(
      resolveCacheSettings(
        { cacheDir: 'cache' },
        { TRAKT_DATA_CACHE_LIMIT: '2MB', TRAKT_DATA_CACHE_MIN_AGE: '12h' },
      ),
    ).toEqual({ cacheDir: path.resolve('cache'), limitBytes: 2 * 1024 * 1024, minAgeMs: 12 * 60 * 60 * 1000 });
  });

  it('turns pruning off without a limit unless a fallback is given', () => {
    const env = { XDG_CACHE_HOME: '/tmp/xdg' };

    expect(resolveCacheSettings({}, env)).toEqual({
      cacheDir: path.join('/tmp/xdg', 'trakt-snapshot'),
      limitBytes: null,
      minAgeMs: 24 * 60 * 60 * 1000,
    });
    expect(resolveCacheSettings({}, env, '1KB').limitBytes).toBe(1024);
  });

  it('accepts a zero minimum age', () => {
    expect(resolveCacheSettings({ cacheMinAge: '0' }, {}).minAgeMs).toBe(0);
  });

  it('names the setting in parse errors', () => {
    expect(() => resolveCacheSettings({ cacheLimit: 'lots' }, {})).toThrow(
      'TRAKT_DATA_CACHE_LIMIT: Invalid size: lots',
    );
    expect(() => resolveCacheSettings({}, { TRAKT_DATA_CACHE_MIN_AGE: '3w' })).toThrow(
      'TRAKT_DATA_CACHE_MIN_AGE: Invalid duration: 3w',
    );
  });
});

describe('resolveLiveChecksumUrl', () => {
  it('is optional', () => {
    expect(resolveLiveChecksumUrl({}, { LIVE_CHECKSUM_URL: '' })).toBeNull();
  });

  it('rejects values that are not URLs', () => {
    expect(() => resolveLiveChecksumUrl({ liveChecksumUrl: 'not a url' }, {})).toThrow(ConfigError);
  });
});

describe('resolveSyncConfig', () => {
  it('combines every setting', () => {
    const config = resolveSyncConfig(
      { outputDir: 'out' },
      {
        TRAKT_CLIENT_ID: 'test-id',
        TRAKT_ACCESS_TOKEN: 'test-token',
        TRAKT_DATA_CACHE_DIR: '/tmp/trakt-cache',
        LIVE_CHECKSUM_URL: 'https://example.test/checksum.txt',
      },
    );

    expect(config).toEqual({
      credentials: { clientId: 'test-id', accessToken: 'test-token' },
      outputDir: path.resolve('out'),
      exclude: [],
      cache: { cacheDir: '/tmp/trakt-cache', limitBytes: null, minAgeMs: 24 * 60 * 60 * 1000 },
      liveChecksumUrl: 'https://example.test/checksum.txt',
    });
  });
});
