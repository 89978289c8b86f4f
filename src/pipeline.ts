import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { PruneResult, ResponseCache } from './cache/cache.js';
import { CachedFetcher, type FetcherCounters } from './clients/fetcher.js';
import type { UpstreamClient } from './clients/trakt.js';
import { Exporter } from './export/exporter.js';
import { commitSnapshot, type CommitResult, type Snapshot } from './export/snapshot.js';
import { EXPORT_DIRECTORIES } from './export/targets.js';
import { createLogger, type Logger } from './logger.js';
import { addMetrics, METRICS_DIR } from './metrics/aggregate.js';
import { PublishGate, type LiveChecksumSource } from './publish/gate.js';
import { formatBytes } from './utils/size.js';

export type SyncStatus = 'published' | 'unchanged' | 'failed';

export const EXIT_CODES: Record<SyncStatus, number> = {
  published: 0,
  unchanged: 3,
  failed: 1,
};

export interface PipelineDependencies {
  client: UpstreamClient;
  cache: ResponseCache;
  logger?: Logger | undefined;
}

export interface ExportOptions {
  outputDir: string;
  exclude: readonly string[];
}

export interface SyncOptions extends ExportOptions {
  liveChecksum: LiveChecksumSource;
  /** Cache bounds applied after the gate; null skips pruning. */
  prune: { maxTotalSize: number; minAgeMs: number } | null;
}

export interface ExportResult {
  commit: CommitResult;
  counters: FetcherCounters;
}

export interface SyncResult {
  status: SyncStatus;
  exitCode: number;
  checksum: string | null;
  liveChecksum: string | null;
  commit: CommitResult | null;
  prune: PruneResult | null;
  counters: FetcherCounters;
  error?: unknown;
}

/** Fetches every target and derives the metrics, all in memory. */
async function buildSnapshot(
  fetcher: CachedFetcher,
  options: ExportOptions,
  deps: PipelineDependencies,
  logger: Logger,
): Promise<Snapshot> {
  const exporter = new Exporter(fetcher, { exclude: options.exclude, logger: scoped(deps, 'export') });
  const snapshot = await exporter.collect();
  addMetrics(snapshot);
  logger.info(
    `Fetched with ${fetcher.counters.hits} cache hits, ${fetcher.counters.misses} misses (${fetcher.counters.stale} stale)`,
  );
  return snapshot;
}

async function commit(snapshot: Snapshot, options: ExportOptions, logger: Logger): Promise<CommitResult> {
  const result = await commitSnapshot(options.outputDir, snapshot, {
    exclude: options.exclude,
    owned: [...EXPORT_DIRECTORIES, METRICS_DIR],
  });
  logger.info(
    `Wrote ${result.written.length} files, ${result.unchanged.length} unchanged, deleted ${result.deleted.length}`,
  );
  return result;
}

/** Export and metrics into the output directory, without the publish gate. */
export async function runExport(deps: PipelineDependencies, options: ExportOptions): Promise<ExportResult> {
  const logger = scoped(deps, 'sync');
  const fetcher = new CachedFetcher(deps.client, deps.cache, { logger: scoped(deps, 'fetcher') });
  const snapshot = await buildSnapshot(fetcher, options, deps, logger);
  return { commit: await commit(snapshot, options, logger), counters: fetcher.counters };
}

/**
 * One scheduled run: fetch and export, metrics, read the live checksum,
 * commit, gate, then prune the cache. A failure before the commit leaves the
 * output directory as it was.
 */
export async function runSync(deps: PipelineDependencies, options: SyncOptions): Promise<SyncResult> {
  const logger = scoped(deps, 'sync');
  const fetcher = new CachedFetcher(deps.client, deps.cache, { logger: scoped(deps, 'fetcher') });
  let commitResult: CommitResult | null = null;

  try {
    const snapshot = await buildSnapshot(fetcher, options, deps, logger);
    const liveChecksum = await options.liveChecksum.read();
    logger.debug(`Live checksum from ${options.liveChecksum.description}: ${liveChecksum ?? 'none'}`);

    commitResult = await commit(snapshot, options, logger);
    const gate = await new PublishGate({ logger: scoped(deps, 'publish') }).evaluate(options.outputDir, liveChecksum);

    return {
      status: gate.status,
      exitCode: EXIT_CODES[gate.status],
      checksum: gate.checksum,
      liveChecksum,
      commit: commitResult,
      prune: await pruneCache(deps.cache, options, logger),
      counters: fetcher.counters,
    };
  } catch (error) {
    logger.error(`Sync failed: ${error instanceof Error ? error.message : String(error)}`);
    return {
      status: 'failed',
      exitCode: EXIT_CODES.failed,
      checksum: null,
      liveChecksum: null,
      commit: commitResult,
      prune: null,
      counters: fetcher.counters,
      error,
    };
  }
}

async function pruneCache(cache: ResponseCache, options: SyncOptions, logger: Logger): Promise<PruneResult | null> {
  if (!options.prune) {
    return null;
  }
  // Output is committed and gated by now; a prune failure leaves the status as it is.
  try {
    const result = await cache.prune(options.prune);
    logger.info(
      `Pruned ${result.deletedCount} cache entries (${formatBytes(result.reclaimedBytes)}), ${result.remainingCount} remain`,
    );
    return result;
  } catch (error) {
    logger.warn(`Cache prune failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function scoped(deps: PipelineDependencies, scope: string): Logger {
  return deps.logger ?? createLogger(scope);
}

/** Appends step outputs for GitHub Actions. */
export async function writeGithubOutput(outputFile: string, result: SyncResult): Promise<void> {
  await fs.mkdir(path.dirname(outputFile), { recursive: true });
  const lines = [`published=${result.status === 'published'}`, `checksum=${result.checksum ?? ''}`];
  await fs.appendFile(outputFile, `${lines.join('\n')}\n`, 'utf8');
}
