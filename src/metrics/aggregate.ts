import { formatCsv } from '../csv/writer.js';
import { LISTS_FILE } from '../export/targets.js';
import type { Snapshot } from '../export/snapshot.js';
import { jot, type JotSchema } from '../jot.js';
import { compareCodeUnits } from '../utils/hash.js';
import { toEpochMs } from '../utils/time.js';

export const METRICS_DIR = 'metrics';
export const SUMMARY_FILE = `${METRICS_DIR}/summary.json`;
export const PLAYS_BY_MONTH_FILE = `${METRICS_DIR}/plays-by-month.csv`;

const HISTORY_FILE = 'watched/history.json';
const WATCHLIST_FILE = 'lists/watchlist.json';
const RATING_FILES = {
  episodes: 'ratings/ratings-episodes.json',
  movies: 'ratings/ratings-movies.json',
  seasons: 'ratings/ratings-seasons.json',
  shows: 'ratings/ratings-shows.json',
} as const;

const historySchema = jot.array(
  jot.object({ watched_at: jot.string(), type: jot.enum(['movie', 'episode'] as const) }, { passthrough: true }),
);
const ratingsSchema = jot.array(jot.object({ rating: jot.number({ integer: true, min: 1 }) }, { passthrough: true }));
const collectionShowsSchema = jot.array(
  jot.object(
    { seasons: jot.optional(jot.array(jot.object({ episodes: jot.optional(jot.array(jot.unknown())) }))) },
    { passthrough: true },
  ),
);
const watchlistSchema = jot.array(jot.object({ type: jot.string() }, { passthrough: true }));
const listsSchema = jot.array(
  jot.object({ name: jot.string(), ids: jot.object({ trakt: jot.number({ integer: true }), slug: jot.string() }) }),
);

export interface PlayCounts {
  movies: number;
  episodes: number;
}

export interface MetricsSummary {
  plays?: PlayCounts & { total: number; by_year: Record<string, PlayCounts> };
  ratings?: Record<string, Record<string, number>>;
  collection?: { movies?: number; shows?: number; episodes?: number };
  watchlist?: { total: number; by_type: Record<string, number> };
  lists?: { id: number; slug: string; name: string; items: number }[];
}

export interface Metrics {
  summary: MetricsSummary;
  playsByMonth: { month: string; movies: number; episodes: number; total: number }[];
}

/**
 * Derives aggregate metrics from the exported files of a snapshot. Sections
 * whose source files were excluded from the run are left out.
 */
export function computeMetrics(snapshot: Snapshot): Metrics {
  const summary: MetricsSummary = {};
  let playsByMonth: Metrics['playsByMonth'] = [];

  const history = read(snapshot, HISTORY_FILE, historySchema);
  if (history) {
    const byYear = new Map<string, PlayCounts>();
    const byMonth = new Map<string, PlayCounts>();
    for (const item of history) {
      const month = new Date(toEpochMs(item.watched_at)).toISOString().slice(0, 7);
      const field = item.type === 'movie' ? 'movies' : 'episodes';
      increment(byYear, month.slice(0, 4), field);
      increment(byMonth, month, field);
    }
    const movies = history.filter((item) => item.type === 'movie').length;
    summary.plays = {
      total: history.length,
      movies,
      episodes: history.length - movies,
      by_year: Object.fromEntries(byYear),
    };
    playsByMonth = [...byMonth.entries()]
      .sort(([a], [b]) => compareCodeUnits(a, b))
      .map(([month, counts]) => ({ month, ...counts, total: counts.movies + counts.episodes }));
  }

  for (const [type, file] of Object.entries(RATING_FILES)) {
    const ratings = read(snapshot, file, ratingsSchema);
    if (!ratings) {
      continue;
    }
    const distribution: Record<string, number> = {};
    for (let value = 1; value <= 10; value += 1) {
      distribution[String(value)] = 0;
    }
    for (const { rating } of ratings) {
      distribution[String(rating)] = (distribution[String(rating)] ?? 0) + 1;
    }
    summary.ratings = { ...summary.ratings, [type]: distribution };
  }

  const collectedMovies = read(snapshot, 'collection/collection-movies.json', jot.array(jot.unknown()));
  const collectedShows = read(snapshot, 'collection/collection-shows.json', collectionShowsSchema);
  if (collectedMovies || collectedShows) {
    const collection: NonNullable<MetricsSummary['collection']> = {};
    if (collectedMovies) {
      collection.movies = collectedMovies.length;
    }
    if (collectedShows) {
      collection.shows = collectedShows.length;
      collection.episodes = collectedShows.reduce(
        (total, show) =>
          total + (show.seasons ?? []).reduce((count, season) => count + (season.episodes?.length ?? 0), 0),
        0,
      );
    }
    summary.collection = collection;
  }

  const watchlist = read(snapshot, WATCHLIST_FILE, watchlistSchema);
  if (watchlist) {
    const byType: Record<string, number> = {};
    for (const { type } of watchlist) {
      byType[type] = (byType[type] ?? 0) + 1;
    }
    summary.watchlist = { total: watchlist.length, by_type: byType };
  }

  const lists = read(snapshot, LISTS_FILE, listsSchema);
  if (lists) {
    summary.lists = lists
      .map((list) => {
        const items = snapshot.json(`lists/list-${list.ids.trakt}-${list.ids.slug}.json`);
        return {
          id: list.ids.trakt,
          slug: list.ids.slug,
          name: list.name,
          items: Array.isArray(items) ? items.length : 0,
        };
      })
      .sort((a, b) => a.id - b.id);
  }

  return { summary, playsByMonth };
}

/** Adds the metrics files to the snapshot. */
export function addMetrics(snapshot: Snapshot): Metrics {
  const metrics = computeMetrics(snapshot);
  snapshot.setJson(SUMMARY_FILE, metrics.summary);
  snapshot.setText(PLAYS_BY_MONTH_FILE, formatCsv(['month', 'movies', 'episodes', 'total'], metrics.playsByMonth));
  return metrics;
}

function read<T>(snapshot: Snapshot, file: string, schema: JotSchema<T>): T | undefined {
  const value = snapshot.json(file);
  return value === undefined ? undefined : schema.parse(value, file);
}

function increment(counts: Map<string, PlayCounts>, key: string, field: keyof PlayCounts): void {
  const current = counts.get(key) ?? { movies: 0, episodes: 0 };
  counts.set(key, { ...current, [field]: current[field] + 1 });
}
