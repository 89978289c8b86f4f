import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheCorruptionError, isNotFound } from '../errors.js';
import { isRecord, jot, parseJson } from '../jot.js';
import { createLogger, type Logger } from '../logger.js';
import { listFilesRecursive, readFileOrNull, removeFile, TEMP_SUFFIX, writeFileAtomic } from '../utils/fileUtils.js';
import { compareCodeUnits, sha256Hex } from '../utils/hash.js';
import { toEpochMs } from '../utils/time.js';
import type {
  CacheEntry,
  CacheIndexEntry,
  CacheStats,
  PruneOptions,
  PruneResult,
  ResponseCache,
} from './cache.js';

const BODY_SUFFIX = '.body';
const META_SUFFIX = '.meta.json';
const KEY_PATTERN = /^[0-9a-z][0-9a-z_-]+$/;

const metadataFileSchema = jot.object({
  key: jot.string(),
  storedAt: jot.string(),
  size: jot.number({ integer: true, min: 0 }),
  sha256: jot.string(),
  metadata: jot.optional(jot.unknown()),
});

interface MetadataFile {
  key: string;
  storedAt: string;
  size: number;
  sha256: string;
  metadata?: Record<string, unknown>;
}

export interface FileCacheOptions {
  baseDir?: string | undefined;
  now?: (() => Date) | undefined;
  logger?: Logger | undefined;
}

interface IndexScan {
  rows: CacheIndexEntry[];
  orphans: string[];
  temps: string[];
}

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  const cacheHome = env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(cacheHome, 'trakt-snapshot');
}

/**
 * Cache entries live as `<prefix>/<key>.body` plus `<prefix>/<key>.meta.json`,
 * where the prefix is the first two characters of the key. The metadata files
 * form the index: stats and pruning never open a body.
 */
export class FileCache implements ResponseCache {
  readonly baseDir: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? defaultCacheDir();
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? createLogger('cache');
  }

  async get(key: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(key);
    const [body, metaRaw] = await Promise.all([readOrCorrupt(bodyPath), readOrCorrupt(metaPath)]);

    if (body === null && metaRaw === null) {
      return null;
    }

    try {
      if (body === null || body instanceof Error) {
        throw new CacheCorruptionError(key, body === null ? 'body is missing' : `body unreadable (${body.message})`);
      }
      if (metaRaw === null || metaRaw instanceof Error) {
        throw new CacheCorruptionError(key, metaRaw === null ? 'metadata is missing' : 'metadata unreadable');
      }

      const meta = parseMetadata(key, metaRaw);
      if (meta.key !== key) {
        throw new CacheCorruptionError(key, `metadata belongs to ${meta.key}`);
      }
      const size = Buffer.byteLength(body, 'utf8');
      if (size !== meta.size) {
        throw new CacheCorruptionError(key, `expected ${meta.size} bytes, found ${size}`);
      }
      if (sha256Hex(body) !== meta.sha256) {
        throw new CacheCorruptionError(key, 'digest mismatch');
      }

      return {
        key,
        body,
        storedAt: meta.storedAt,
        size,
        ...(meta.metadata ? { metadata: meta.metadata } : {}),
      };
    } catch (error) {
      if (error instanceof CacheCorruptionError) {
        this.logger.warn(`${error.message}; treating as a miss`);
        return null;
      }
      throw error;
    }
  }

  async put(key: string, body: string, metadata?: Record<string, unknown>): Promise<CacheEntry> {
    const { bodyPath, metaPath } = this.paths(key);
    const entry: CacheEntry = {
      key,
      body,
      storedAt: this.now().toISOString(),
      size: Buffer.byteLength(body, 'utf8'),
      ...(metadata ? { metadata } : {}),
    };
    const meta: MetadataFile = {
      key,
      storedAt: entry.storedAt,
      size: entry.size,
      sha256: sha256Hex(body),
      ...(metadata ? { metadata } : {}),
    };

    // Body first: a crash in between leaves an orphan body, which reads treat as a miss.
    await writeFileAtomic(bodyPath, body, { durable: true });
    await writeFileAtomic(metaPath, `${JSON.stringify(meta, null, 2)}\n`, { durable: true });
    return entry;
  }

  async entries(): Promise<CacheIndexEntry[]> {
    const { rows } = await this.scan();
    return rows;
  }

  async stats(): Promise<CacheStats> {
    const rows = await this.entries();
    let totalSize = 0;
    let oldest: CacheIndexEntry | null = null;
    let newest: CacheIndexEntry | null = null;

    for (const row of rows) {
      totalSize += row.size;
      const storedAtMs = toEpochMs(row.storedAt);
      if (!oldest || storedAtMs < toEpochMs(oldest.storedAt)) {
        oldest = row;
      }
      if (!newest || storedAtMs > toEpochMs(newest.storedAt)) {
        newest = row;
      }
    }

    return {
      entryCount: rows.length,
      totalSize,
      oldestStoredAt: oldest?.storedAt ?? null,
      newestStoredAt: newest?.storedAt ?? null,
    };
  }

  async prune(options: PruneOptions): Promise<PruneResult> {
    const { rows, orphans, temps } = await this.scan();
    const nowMs = this.now().getTime();
    let remainingBytes = rows.reduce((sum, row) => sum + row.size, 0);
    let remainingCount = rows.length;

    const eligible = rows
      .map((row) => ({ row, storedAtMs: toEpochMs(row.storedAt) }))
      .filter(({ storedAtMs }) => nowMs - storedAtMs >= options.minAgeMs)
      .sort((a, b) => a.storedAtMs - b.storedAtMs || compareCodeUnits(a.row.key, b.row.key));

    let deletedCount = 0;
    let reclaimedBytes = 0;
    for (const { row } of eligible) {
      if (remainingBytes <= options.maxTotalSize) {
        break;
      }
      this.logger.debug(`Prune ${row.key} (${row.storedAt}, ${row.size} bytes)`);
      if (!options.dryRun) {
        await this.remove(row.key);
      }
      deletedCount += 1;
      reclaimedBytes += row.size;
      remainingBytes -= row.size;
      remainingCount -= 1;
    }

    if (remainingBytes > options.maxTotalSize) {
      this.logger.info(
        `Cache still holds ${remainingBytes} bytes over the ${options.maxTotalSize} byte limit; remaining entries are younger than the minimum age`,
      );
    }

    // Temp files younger than the minimum age may belong to a write still in flight.
    const staleTemps = await this.olderThan(temps, nowMs - options.minAgeMs);

    if (!options.dryRun) {
      for (const orphan of orphans) {
        this.logger.debug(`Removing orphaned cache file ${orphan}`);
        await removeFile(path.join(this.baseDir, orphan));
      }
      for (const temp of staleTemps) {
        this.logger.debug(`Removing leftover temp file ${temp}`);
        await removeFile(path.join(this.baseDir, temp));
      }
    }

    return {
      deletedCount,
      reclaimedBytes,
      remainingCount,
      remainingBytes,
      orphansRemoved: options.dryRun ? 0 : orphans.length,
      tempFilesRemoved: options.dryRun ? 0 : staleTemps.length,
    };
  }

  private async olderThan(files: readonly string[], cutoffMs: number): Promise<string[]> {
    const result: string[] = [];
    for (const file of files) {
      try {
        const { mtimeMs } = await fs.stat(path.join(this.baseDir, file));
        if (mtimeMs <= cutoffMs) {
          result.push(file);
        }
      } catch (error) {
        if (!isNotFound(error)) {
          throw error;
        }
      }
    }
    return result;
  }

  private async remove(key: string): Promise<void> {
    const { bodyPath, metaPath } = this.paths(key);
    await removeFile(metaPath);
    await removeFile(bodyPath);
  }

  private async scan(): Promise<IndexScan> {
    const files = await listFilesRecursive(this.baseDir);
    const bodies = new Set<string>();
    const metas = new Map<string, string>();
    const temps: string[] = [];

    for (const file of files) {
      const segments = file.split('/');
      const name = segments.pop() ?? file;
      if (segments.some((segment) => segment.startsWith('.'))) {
        continue;
      }
      if (name.startsWith('.')) {
        if (name.endsWith(TEMP_SUFFIX)) {
          temps.push(file);
        }
        continue;
      }
      if (file.endsWith(META_SUFFIX)) {
        metas.set(path.posix.basename(file, META_SUFFIX), file);
      } else if (file.endsWith(BODY_SUFFIX)) {
        bodies.add(file);
      }
    }

    const rows: CacheIndexEntry[] = [];
    const orphans: string[] = [];
    const indexedBodies = new Set<string>();

    for (const [key, metaFile] of metas) {
      const bodyFile = metaFile.slice(0, -META_SUFFIX.length) + BODY_SUFFIX;
      if (!bodies.has(bodyFile)) {
        orphans.push(metaFile);
        continue;
      }

      const metaRaw = await readFileOrNull(path.join(this.baseDir, metaFile));
      let meta: MetadataFile | null = null;
      if (metaRaw !== null) {
        try {
          meta = parseMetadata(key, metaRaw);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Ignoring unreadable cache metadata ${metaFile}: ${reason}`);
        }
      }
      if (!meta || meta.key !== key) {
        orphans.push(metaFile);
        continue;
      }

      indexedBodies.add(bodyFile);
      rows.push({ key: meta.key, storedAt: meta.storedAt, size: meta.size });
    }

    for (const body of bodies) {
      if (!indexedBodies.has(body)) {
        orphans.push(body);
      }
    }

    rows.sort((a, b) => compareCodeUnits(a.key, b.key));
    orphans.sort(compareCodeUnits);
    temps.sort(compareCodeUnits);
    return { rows, orphans, temps };
  }

  private paths(key: string) {
    if (!KEY_PATTERN.test(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    const dir = path.join(this.baseDir, key.slice(0, 2));
    return {
      dir,
      bodyPath: path.join(dir, `${key}${BODY_SUFFIX}`),
      metaPath: path.join(dir, `${key}${META_SUFFIX}`),
    };
  }
}

function parseMetadata(key: string, raw: string): MetadataFile {
  const { metadata, ...rest } = parseMetadataFile(key, raw);
  if (metadata !== undefined && isRecord(metadata)) {
    return { ...rest, metadata };
  }
  return rest;
}

function parseMetadataFile(key: string, raw: string) {
  try {
    const parsed = parseJson(raw, metadataFileSchema, 'metadata');
    toEpochMs(parsed.storedAt);
    return parsed;
  } catch (error) {
    throw new CacheCorruptionError(key, error instanceof Error ? error.message : String(error));
  }
}

async function readOrCorrupt(filePath: string): Promise<string | null | Error> {
  try {
    return await readFileOrNull(filePath);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}
