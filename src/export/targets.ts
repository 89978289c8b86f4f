import type { ApiRequest } from '../clients/trakt.js';
import { jot, type JotSchema } from '../jot.js';
import type { ActivityPath } from '../types/index.js';
import type { NestedOrder, RecordOrder } from './serialize.js';

export interface ExportTarget {
  /** Output path relative to the data directory. */
  file: string;
  request: ApiRequest;
  /** Last-activity timestamps that move when this data changes. */
  activities: ActivityPath[];
  /** Ordering of the records of an array payload. */
  order: RecordOrder | null;
  /** Validates the payload and keeps only the fields it names. */
  schema?: JotSchema<unknown> | undefined;
}

export const LAST_ACTIVITIES_FILE = 'user/last-activities.json';
export const LISTS_FILE = 'lists/lists.json';
export const WATCHED_SHOWS_FILE = 'watched/watched-shows.json';
export const SHOW_PROGRESS_FILE = 'watched/progress-shows.json';
export const UP_NEXT_FILE = 'watched/up-next.json';
export const HIDDEN_DROPPED_FILE = 'hidden/hidden-dropped.json';
export const HIDDEN_PROGRESS_WATCHED_FILE = 'hidden/hidden-progress-watched.json';

export const LAST_ACTIVITIES_REQUEST: ApiRequest = { path: '/sync/last_activities' };

const HIDDEN_ACTIVITIES: ActivityPath[] = [
  ['movies', 'hidden_at'],
  ['shows', 'hidden_at'],
  ['seasons', 'hidden_at'],
];

const SEASONS: RecordOrder = { by: ['number'], nested: { episodes: { by: ['number'] } } };

/** Arrays inside a `/shows/:id/progress/watched` payload. */
export const SHOW_PROGRESS_ORDER: NestedOrder = {
  seasons: SEASONS,
  hidden_seasons: { by: ['number'] },
};

const profileSchema = jot.object({
  username: jot.string(),
  name: jot.nullable(jot.string()),
  vip: jot.boolean(),
  vip_ep: jot.boolean(),
  ids: jot.object({ slug: jot.string() }, { passthrough: true }),
  vip_og: jot.optional(jot.boolean()),
  vip_years: jot.optional(jot.number({ integer: true, min: 0 })),
});

const COMMENT_TYPES = ['episodes', 'lists', 'movies', 'seasons', 'shows'] as const;
const HIDDEN_SECTIONS = [
  'calendar',
  'dropped',
  'progress_collected',
  'progress_watched_reset',
  'progress_watched',
  'recommendations',
] as const;
const RATING_TYPES = [
  ['episodes', 'episode'],
  ['movies', 'movie'],
  ['seasons', 'season'],
  ['shows', 'show'],
] as const;

export function listItemsTarget(listId: number, slug: string): ExportTarget {
  return {
    file: `lists/list-${listId}-${slug}.json`,
    request: { path: `/users/me/lists/${listId}/items`, paginated: true },
    activities: [['lists', 'updated_at']],
    order: { by: ['rank'] },
  };
}

export function showProgressRequest(showId: number): ApiRequest {
  return { path: `/shows/${showId}/progress/watched` };
}

/** Every endpoint exported, in fetch order. */
export const EXPORT_TARGETS: readonly ExportTarget[] = [
  {
    file: 'collection/collection-movies.json',
    request: { path: '/sync/collection/movies' },
    activities: [['movies', 'collected_at']],
    order: { by: ['movie', 'ids', 'trakt'] },
  },
  {
    file: 'collection/collection-shows.json',
    request: { path: '/sync/collection/shows' },
    activities: [['episodes', 'collected_at']],
    order: { by: ['show', 'ids', 'trakt'], nested: { seasons: SEASONS } },
  },
  ...COMMENT_TYPES.map(
    (type): ExportTarget => ({
      file: `comments/comments-${type}.json`,
      request: { path: `/users/me/comments/${type}`, paginated: true },
      activities: [[type, 'commented_at']],
      order: { by: ['comment', 'id'] },
    }),
  ),
  ...HIDDEN_SECTIONS.map(
    (section): ExportTarget => ({
      file: `hidden/hidden-${section.replace(/_/g, '-')}.json`,
      request: { path: `/users/hidden/${section}`, paginated: true },
      activities: section === 'dropped' ? [['shows', 'dropped_at']] : HIDDEN_ACTIVITIES,
      order: { by: ['hidden_at'] },
    }),
  ),
  {
    file: 'likes/likes-comments.json',
    request: { path: '/users/me/likes/comments', paginated: true },
    activities: [['comments', 'liked_at']],
    order: { by: ['liked_at'] },
  },
  {
    file: 'likes/likes-lists.json',
    request: { path: '/users/me/likes/lists', paginated: true },
    activities: [['lists', 'liked_at']],
    order: { by: ['liked_at'] },
  },
  {
    file: LISTS_FILE,
    request: { path: '/users/me/lists' },
    activities: [['lists', 'updated_at']],
    order: { by: ['ids', 'trakt'] },
  },
  {
    file: 'lists/watchlist.json',
    request: { path: '/sync/watchlist', params: { sort_by: 'rank', sort_how: 'asc' }, paginated: true },
    activities: [['watchlist', 'updated_at']],
    order: { by: ['rank'] },
  },
  ...RATING_TYPES.map(
    ([type, singular]): ExportTarget => ({
      file: `ratings/ratings-${type}.json`,
      request: { path: `/sync/ratings/${type}` },
      activities: [[type, 'rated_at']],
      order: { by: [singular, 'ids', 'trakt'] },
    }),
  ),
  {
    file: 'user/profile.json',
    request: { path: '/users/me', params: { extended: 'vip' } },
    activities: [['account', 'settings_at']],
    order: null,
    schema: profileSchema,
  },
  {
    file: 'user/stats.json',
    request: { path: '/users/me/stats' },
    activities: [['all']],
    order: null,
  },
  {
    file: 'watched/history.json',
    request: { path: '/sync/history', paginated: true },
    activities: [
      ['movies', 'watched_at'],
      ['episodes', 'watched_at'],
    ],
    order: { by: ['id'] },
  },
  {
    file: 'watched/playback.json',
    request: { path: '/sync/playback' },
    activities: [
      ['movies', 'paused_at'],
      ['episodes', 'paused_at'],
    ],
    order: { by: ['id'] },
  },
  {
    file: 'watched/watched-movies.json',
    request: { path: '/sync/watched/movies' },
    activities: [['movies', 'watched_at']],
    order: { by: ['movie', 'ids', 'trakt'] },
  },
  {
    file: WATCHED_SHOWS_FILE,
    request: { path: '/sync/watched/shows' },
    activities: [['episodes', 'watched_at']],
    order: { by: ['show', 'ids', 'trakt'], nested: { seasons: SEASONS } },
  },
];

/** Top-level output directories whose files all come from an export run. */
export const EXPORT_DIRECTORIES: readonly string[] = [
  ...new Set([LAST_ACTIVITIES_FILE, ...EXPORT_TARGETS.map((target) => target.file)].map(topLevelDirectory)),
].sort();

function topLevelDirectory(file: string): string {
  const slash = file.indexOf('/');
  return slash === -1 ? file : file.slice(0, slash);
}
