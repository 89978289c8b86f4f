import { EXPORT_TARGETS } from '../export/targets.js';

/** Timestamp every section of the canned last-activities payload reports. */
export const CHANGED_AT = '2024-05-01T00:00:00.000Z';

/** A last-activities payload covering every section the export targets read. */
export function activitiesAt(
  timestamp: string,
  overrides: Record<string, Record<string, string>> = {},
): Record<string, unknown> {
  const sections: Record<string, Record<string, string>> = {};
  for (const target of EXPORT_TARGETS) {
    for (const [section, field] of target.activities) {
      if (field !== undefined) {
        sections[section] = { ...sections[section], [field]: timestamp, ...overrides[section] };
      }
    }
  }
  return { all: timestamp, ...sections };
}

/** Canned upstream responses for every export target, keyed by request path. */
export function traktRoutes(): Record<string, unknown> {
  const table: Record<string, unknown> = { '/sync/last_activities': activitiesAt(CHANGED_AT) };
  for (const target of EXPORT_TARGETS) {
    table[target.request.path] = target.order ? [] : {};
  }
  return {
    ...table,
    '/sync/history': [
      { id: 30, watched_at: '2024-04-03T20:00:00.000Z', type: 'movie' },
      { id: 10, watched_at: '2024-04-01T20:00:00.000Z', type: 'episode' },
      { id: 20, watched_at: '2024-04-02T20:00:00.000Z', type: 'movie' },
    ],
    '/users/me/lists': [{ name: 'Favourites', ids: { trakt: 7, slug: 'favourites' } }],
    '/users/me/lists/7/items': [
      { rank: 2, type: 'movie', movie: { ids: { trakt: 2 } } },
      { rank: 1, type: 'movie', movie: { ids: { trakt: 1 } } },
    ],
    '/sync/watched/shows': [
      { plays: 4, show: { title: 'Second', ids: { trakt: 9 } } },
      { plays: 3, show: { title: 'First', ids: { trakt: 5 } } },
    ],
    '/shows/5/progress/watched': {
      aired: 10,
      completed: 3,
      last_watched_at: '2024-04-01T20:00:00.000Z',
      reset_at: null,
      next_episode: { season: 1, number: 4, title: 'Four', ids: { trakt: 504 } },
      last_episode: { season: 2, number: 2, title: 'Finale', ids: { trakt: 522 } },
    },
    '/shows/9/progress/watched': { aired: 8, completed: 8, next_episode: null },
    '/users/me': {
      username: 'viewer',
      private: false,
      name: 'Test Viewer',
      vip: true,
      vip_ep: false,
      ids: { slug: 'viewer' },
      joined_at: '2020-01-01T00:00:00.000Z',
      vip_og: false,
      vip_years: 2,
    },
  };
}
