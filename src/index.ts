#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { formatAgeReport, summarizeAges } from './cache/ageReport.js';
import { FileCache } from './cache/fileCache.js';
import { TraktClient } from './clients/trakt.js';
import {
  DEFAULT_CACHE_LIMIT,
  DEFAULT_CACHE_MIN_AGE,
  resolveCacheSettings,
  resolveCredentials,
  resolveExclude,
  resolveOutputDir,
  resolveSyncConfig,
  type RawOptions,
} from './config.js';
import { configureLogging, createLogger } from './logger.js';
import { runExport, runSync, writeGithubOutput } from './pipeline.js';
import { checksumManifest, CHECKSUM_FILE, treeChecksum } from './publish/checksum.js';
import { FileChecksumSource, HttpChecksumSource, type LiveChecksumSource } from './publish/gate.js';
import { formatBytes } from './utils/size.js';

dotenv.config();

const program = new Command();
program
  .name('trakt-snapshot')
  .description('Export Trakt watch history as a data snapshot and publish it only when the content changed.')
  .version('0.1.0');

interface VerboseOptions {
  verbose?: boolean;
}

interface SyncCommandOptions extends RawOptions, VerboseOptions {}

interface ChecksumCommandOptions extends VerboseOptions {
  outputDir?: string;
  manifest?: boolean;
}

interface PruneCommandOptions extends RawOptions, VerboseOptions {
  dryRun?: boolean;
}

withVerbose(withCache(withExport(program.command('sync').description('Export, gate and prune in one run.'))))
  .option('--live-checksum-url <url>', 'URL of the published checksum.txt (env LIVE_CHECKSUM_URL).')
  .option('--cache-limit <size>', 'Prune the cache to this size after the run (env TRAKT_DATA_CACHE_LIMIT).')
  .option('--cache-min-age <duration>', 'Never prune entries younger than this (env TRAKT_DATA_CACHE_MIN_AGE).')
  .action(async (rawOptions: SyncCommandOptions) => {
    await handleSync(rawOptions);
  });

const exportCommand = program.command('export').description('Export data and metrics into the output directory.');
withVerbose(withCache(withExport(exportCommand)))
  .action(async (rawOptions: SyncCommandOptions) => {
    await handleExport(rawOptions);
  });

withVerbose(program.command('checksum').description('Print the checksum of the output directory.'))
  .option('--output-dir <path>', 'Directory to hash (env OUTPUT_DIR).')
  .option('--manifest', 'Print the per-file digest lines instead.')
  .action(async (rawOptions: ChecksumCommandOptions) => {
    await handleChecksum(rawOptions);
  });

withVerbose(withCache(program.command('cache-stats').description('Show size and age distribution of the cache.')))
  .action(async (rawOptions: SyncCommandOptions) => {
    await handleCacheStats(rawOptions);
  });

const pruneCommand = program.command('prune-cache').description('Delete the oldest cache entries over a size limit.');
withVerbose(withCache(pruneCommand))
  .option('--cache-limit <size>', `Target cache size (env TRAKT_DATA_CACHE_LIMIT, default ${DEFAULT_CACHE_LIMIT}).`)
  .option(
    '--cache-min-age <duration>',
    `Never delete entries younger than this (env TRAKT_DATA_CACHE_MIN_AGE, default ${DEFAULT_CACHE_MIN_AGE}).`,
  )
  .option('--dry-run', 'Report what would be deleted without deleting.')
  .action(async (rawOptions: PruneCommandOptions) => {
    await handlePruneCache(rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  createLogger('cli').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

function withVerbose(command: Command): Command {
  return command.option('-v, --verbose', 'Log debug output.').hook('preAction', (_thisCommand, actionCommand) => {
    const options: VerboseOptions = actionCommand.opts();
    configureLogging({ verbose: options.verbose === true });
  });
}

function withExport(command: Command): Command {
  return command
    .option('--trakt-client-id <id>', 'Trakt API client id (env TRAKT_CLIENT_ID).')
    .option('--trakt-access-token <token>', 'Trakt OAuth access token (env TRAKT_ACCESS_TOKEN).')
    .option('--output-dir <path>', 'Data directory to write (env OUTPUT_DIR).')
    .option('--exclude <paths...>', 'Output paths to skip, files or directories (env TRAKT_DATA_EXCLUDE).');
}

function withCache(command: Command): Command {
  return command.option('--cache-dir <path>', 'Response cache directory (env TRAKT_DATA_CACHE_DIR).');
}

function createClient(rawOptions: RawOptions): TraktClient {
  const credentials = resolveCredentials(rawOptions, process.env);
  return new TraktClient({ ...credentials, logger: createLogger('trakt') });
}

async function handleSync(rawOptions: SyncCommandOptions) {
  const config = resolveSyncConfig(rawOptions, process.env);
  const client = new TraktClient({ ...config.credentials, logger: createLogger('trakt') });
  const cache = new FileCache({ baseDir: config.cache.cacheDir });
  const liveChecksum: LiveChecksumSource = config.liveChecksumUrl
    ? new HttpChecksumSource(config.liveChecksumUrl)
    : new FileChecksumSource(path.join(config.outputDir, CHECKSUM_FILE));

  const result = await runSync(
    { client, cache },
    {
      outputDir: config.outputDir,
      exclude: config.exclude,
      liveChecksum,
      prune:
        config.cache.limitBytes === null
          ? null
          : { maxTotalSize: config.cache.limitBytes, minAgeMs: config.cache.minAgeMs },
    },
  );

  const githubOutput = process.env.GITHUB_OUTPUT;
  if (githubOutput) {
    await writeGithubOutput(githubOutput, result);
  }
  console.log(`Sync ${result.status}${result.checksum ? ` (${result.checksum})` : ''}`);
  process.exitCode = result.exitCode;
}

async function handleExport(rawOptions: SyncCommandOptions) {
  const client = createClient(rawOptions);
  const outputDir = resolveOutputDir(rawOptions, process.env);
  const { cacheDir } = resolveCacheSettings(rawOptions, process.env);

  const result = await runExport(
    { client, cache: new FileCache({ baseDir: cacheDir }) },
    { outputDir, exclude: resolveExclude(rawOptions, process.env) },
  );
  console.log(`Exported ${result.commit.written.length + result.commit.unchanged.length} files to ${outputDir}`);
}

async function handleChecksum(rawOptions: ChecksumCommandOptions) {
  const outputDir = resolveOutputDir(rawOptions, process.env);
  if (rawOptions.manifest) {
    process.stdout.write(await checksumManifest(outputDir));
    return;
  }
  console.log(await treeChecksum(outputDir));
}

async function handleCacheStats(rawOptions: RawOptions) {
  const { cacheDir } = resolveCacheSettings(rawOptions, process.env);
  const cache = new FileCache({ baseDir: cacheDir });
  const stats = await cache.stats();
  const report = summarizeAges(await cache.entries(), new Date());

  console.log(`Cache directory: ${cacheDir}`);
  for (const line of formatAgeReport(report, stats.totalSize)) {
    console.log(line);
  }
}

async function handlePruneCache(rawOptions: PruneCommandOptions) {
  const settings = resolveCacheSettings(rawOptions, process.env, DEFAULT_CACHE_LIMIT);
  const cache = new FileCache({ baseDir: settings.cacheDir });
  const dryRun = rawOptions.dryRun === true;

  const result = await cache.prune({
    maxTotalSize: settings.limitBytes ?? 0,
    minAgeMs: settings.minAgeMs,
    dryRun,
  });

  const verb = dryRun ? 'Would delete' : 'Deleted';
  console.log(`${verb} ${result.deletedCount} entries (${formatBytes(result.reclaimedBytes)})`);
  console.log(`Remaining: ${result.remainingCount} entries (${formatBytes(result.remainingBytes)})`);
  if (result.orphansRemoved > 0) {
    console.log(`Removed ${result.orphansRemoved} orphaned files`);
  }
  if (result.tempFilesRemoved > 0) {
    console.log(`Removed ${result.tempFilesRemoved} leftover temp files`);
  }
}
