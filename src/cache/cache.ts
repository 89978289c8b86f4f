export interface CacheEntry {
  key: string;
  body: string;
  storedAt: string;
  size: number;
  metadata?: Record<string, unknown>;
}

/** One row of the cache index: everything but the body. */
export interface CacheIndexEntry {
  key: string;
  storedAt: string;
  size: number;
}

export interface CacheStats {
  entryCount: number;
  totalSize: number;
  oldestStoredAt: string | null;
  newestStoredAt: string | null;
}

export interface PruneOptions {
  maxTotalSize: number;
  minAgeMs: number;
  dryRun?: boolean | undefined;
}

export interface PruneResult {
  deletedCount: number;
  reclaimedBytes: number;
  remainingCount: number;
  remainingBytes: number;
  /** Bodies without metadata and metadata without bodies that were removed. */
  orphansRemoved: number;
  /** Temp files left behind by interrupted writes that were removed. */
  tempFilesRemoved: number;
}

/**
 * Persistent key → response store. Reads ignore age: deciding whether an
 * entry is fresh enough is up to the caller.
 */
export interface ResponseCache {
  get(key: string): Promise<CacheEntry | null>;
  put(key: string, body: string, metadata?: Record<string, unknown>): Promise<CacheEntry>;
  entries(): Promise<CacheIndexEntry[]>;
  stats(): Promise<CacheStats>;
  prune(options: PruneOptions): Promise<PruneResult>;
}
