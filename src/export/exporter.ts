import { REFRESH, type CachedFetcher, type Freshness } from '../clients/fetcher.js';
import { isRecord, jot } from '../jot.js';
import { createLogger, type Logger } from '../logger.js';
import type { ActivityPath } from '../types/index.js';
import { canonicalize, compareCodeUnits } from '../utils/hash.js';
import { sortNested, sortRecords, type RecordOrder } from './serialize.js';
import { isExcluded, Snapshot } from './snapshot.js';
import {
  EXPORT_TARGETS,
  HIDDEN_DROPPED_FILE,
  HIDDEN_PROGRESS_WATCHED_FILE,
  LAST_ACTIVITIES_FILE,
  LAST_ACTIVITIES_REQUEST,
  LISTS_FILE,
  listItemsTarget,
  SHOW_PROGRESS_FILE,
  SHOW_PROGRESS_ORDER,
  showProgressRequest,
  UP_NEXT_FILE,
  WATCHED_SHOWS_FILE,
  type ExportTarget,
} from './targets.js';
import { hiddenShowIds, upNextShows, type ShowProgress } from './upNext.js';

const idsSchema = jot.object({ trakt: jot.number({ integer: true }) }, { passthrough: true });
const listsSchema = jot.array(
  jot.object({ ids: jot.object({ trakt: jot.number({ integer: true }), slug: jot.string() }) }, { passthrough: true }),
);
const watchedShowsSchema = jot.array(
  jot.object(
    { plays: jot.number({ integer: true, min: 0 }), show: jot.object({ ids: idsSchema }, { passthrough: true }) },
    { passthrough: true },
  ),
);

export interface ExporterOptions {
  /** Output-relative paths that are neither fetched nor written. */
  exclude?: readonly string[] | undefined;
  logger?: Logger | undefined;
}

/**
 * Pulls every export target through the fetcher and assembles the in-memory
 * snapshot. Nothing touches the output directory here.
 */
export class Exporter {
  private readonly exclude: readonly string[];
  private readonly logger: Logger;

  constructor(private readonly fetcher: CachedFetcher, options: ExporterOptions = {}) {
    this.exclude = options.exclude ?? [];
    this.logger = options.logger ?? createLogger('export');
  }

  async collect(): Promise<Snapshot> {
    const snapshot = new Snapshot();

    const activities = await this.fetcher.fetch(LAST_ACTIVITIES_REQUEST, REFRESH);
    if (!this.skipped(LAST_ACTIVITIES_FILE)) {
      snapshot.setJson(LAST_ACTIVITIES_FILE, activities);
    }

    const fetched = new Map<string, unknown>();
    for (const target of EXPORT_TARGETS) {
      if (this.skipped(target.file)) {
        continue;
      }
      const data = await this.exportTarget(snapshot, target, activities);
      fetched.set(target.file, data);
    }

    const lists = fetched.get(LISTS_FILE);
    if (lists !== undefined) {
      for (const list of listsSchema.parse(lists, LISTS_FILE)) {
        const target = listItemsTarget(list.ids.trakt, list.ids.slug);
        if (!this.skipped(target.file)) {
          await this.exportTarget(snapshot, target, activities);
        }
      }
    }

    const watchedShows = fetched.get(WATCHED_SHOWS_FILE);
    const wantsProgress = !this.skipped(SHOW_PROGRESS_FILE);
    const wantsUpNext = !this.skipped(UP_NEXT_FILE);
    if (watchedShows !== undefined && (wantsProgress || wantsUpNext)) {
      const shows = watchedShowsSchema.parse(watchedShows, WATCHED_SHOWS_FILE);
      const progress = await this.fetchShowProgress(shows.map(({ show }) => show), activities);
      if (wantsProgress) {
        snapshot.setJson(SHOW_PROGRESS_FILE, progress);
      }
      if (wantsUpNext) {
        const plays = new Map<number, number>();
        for (const { show, plays: count } of shows) {
          plays.set(show.ids.trakt, count);
        }
        const hidden = new Map<string, unknown>();
        for (const file of [HIDDEN_DROPPED_FILE, HIDDEN_PROGRESS_WATCHED_FILE]) {
          if (fetched.has(file)) {
            hidden.set(file, fetched.get(file));
          }
        }
        snapshot.setJson(
          UP_NEXT_FILE,
          upNextShows(progress, plays, hiddenShowIds(hidden), this.logger, SHOW_PROGRESS_FILE),
        );
      }
    }

    this.logger.info(`Collected ${snapshot.paths().length} files`);
    return snapshot;
  }

  private skipped(file: string): boolean {
    if (isExcluded(file, this.exclude)) {
      this.logger.debug(`Skipping excluded ${file}`);
      return true;
    }
    return false;
  }

  private async exportTarget(snapshot: Snapshot, target: ExportTarget, activities: unknown): Promise<unknown> {
    const data = await this.fetcher.fetch(target.request, freshnessFor(activities, target.activities));
    const shaped = target.schema ? target.schema.parse(data, target.file) : data;
    snapshot.setJson(target.file, ordered(shaped, target.order, target.file));
    this.logger.debug(`Exported ${target.file}`);
    return data;
  }

  /** Progress for each watched show, ordered by show id. */
  private async fetchShowProgress(
    shows: readonly ShowProgress['show'][],
    activities: unknown,
  ): Promise<ShowProgress[]> {
    const freshness = freshnessFor(activities, [['episodes', 'watched_at']]);
    const sorted = [...shows].sort(
      (a, b) => a.ids.trakt - b.ids.trakt || compareCodeUnits(canonicalize(a), canonicalize(b)),
    );

    const progress: ShowProgress[] = [];
    for (const show of sorted) {
      const data = await this.fetcher.fetch(showProgressRequest(show.ids.trakt), freshness);
      progress.push({ show, progress: sortNested(data, SHOW_PROGRESS_ORDER, SHOW_PROGRESS_FILE) });
    }
    return progress;
  }
}

function ordered(data: unknown, order: RecordOrder | null, file: string): unknown {
  return order && Array.isArray(data) ? sortRecords(data, order, file) : data;
}

/**
 * Reuse cached responses stored after the most recent of the given activity
 * timestamps. Falls back to a live fetch when any of them is unknown.
 */
export function freshnessFor(activities: unknown, paths: readonly ActivityPath[]): Freshness {
  let latest: { timestamp: string; ms: number } | null = null;
  for (const activityPath of paths) {
    const timestamp = readActivity(activities, activityPath);
    const ms = timestamp === undefined ? Number.NaN : Date.parse(timestamp);
    if (timestamp === undefined || Number.isNaN(ms)) {
      return REFRESH;
    }
    if (!latest || ms > latest.ms) {
      latest = { timestamp, ms };
    }
  }
  return latest ? { kind: 'since', timestamp: latest.timestamp } : REFRESH;
}

function readActivity(activities: unknown, activityPath: ActivityPath): string | undefined {
  let current: unknown = activities;
  for (const key of activityPath) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return typeof current === 'string' ? current : undefined;
}
