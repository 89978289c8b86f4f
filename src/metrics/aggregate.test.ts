import { describe, expect, it } from 'vitest';
import { formatCsv } from '../csv/writer.js';
import { Snapshot } from '../export/snapshot.js';
import { addMetrics, computeMetrics, PLAYS_BY_MONTH_FILE, SUMMARY_FILE } from './aggregate.js';

function sampleSnapshot(): Snapshot {
  const snapshot = new Snapshot();
  snapshot.setJson('watched/history.json', [
    { id: 1, watched_at: '2023-12-31T23:30:00.000Z', type: 'movie' },
    { id: 2, watched_at: '2024-01-05T10:00:00.000Z', type: 'episode' },
    { id: 3, watched_at: '2024-01-06T10:00:00.000Z', type: 'episode' },
    { id: 4, watched_at: '2024-03-01T00:00:00.000Z', type: 'movie' },
  ]);
  snapshot.setJson('ratings/ratings-movies.json', [
    { rating: 8, movie: { ids: { trakt: 1 } } },
    { rating: 8, movie: { ids: { trakt: 2 } } },
    { rating: 10, movie: { ids: { trakt: 3 } } },
  ]);
  snapshot.setJson('collection/collection-movies.json', [{ movie: { ids: { trakt: 1 } } }]);
  snapshot.setJson('collection/collection-shows.json', [
    {
      show: { ids: { trakt: 5 } },
      seasons: [
        { number: 1, episodes: [{ number: 1 }, { number: 2 }] },
        { number: 2, episodes: [{ number: 1 }] },
      ],
    },
  ]);
  snapshot.setJson('lists/watchlist.json', [
    { rank: 1, type: 'movie' },
    { rank: 2, type: 'show' },
    { rank: 3, type: 'movie' },
  ]);
  snapshot.setJson('lists/lists.json', [
    { name: 'Later', ids: { trakt: 9, slug: 'later' } },
    { name: 'Favourites', ids: { trakt: 7, slug: 'favourites' } },
  ]);
  snapshot.setJson('lists/list-7-favourites.json', [{ rank: 1 }, { rank: 2 }]);
  snapshot.setJson('lists/list-9-later.json', []);
  return snapshot;
}

describe('computeMetrics', () => {
  it('counts plays per year and month in UTC', () => {
    const { summary, playsByMonth } = computeMetrics(sampleSnapshot());

    expect(summary.plays).toEqual({
      total: 4,
      movies: 2,
      episodes: 2,
      by_year: { '2023': { movies: 1, episodes: 0 }, '2024': { movies: 1, episodes: 2 } },
    });
    expect(playsByMonth).toEqual([
      { month: '2023-12', movies: 1, episodes: 0, total: 1 },
      { month: '2024-01', movies: 0, episodes: 2, total: 2 },
      { month: '2024-03', movies: 1, episodes: 0, total: 1 },
    ]);
  });

  it('builds a ten-point rating distribution per exported type', () => {
    const { summary } = computeMetrics(sampleSnapshot());

    expect(summary.ratings).toEqual({
      movies: { '1': 0, '2': 0, '3': 0, '4': 0, '5': 0, '6': 0, '7': 0, '8': 2, '9': 0, '10': 1 },
    });
  });

  it('counts collection, watchlist and list items', () => {
    const { summary } = computeMetrics(sampleSnapshot());

    expect(summary.collection).toEqual({ movies: 1, shows: 1, episodes: 3 });
    expect(summary.watchlist).toEqual({ total: 3, by_type: { movie: 2, show: 1 } });
    expect(summary.lists).toEqual([
      { id: 7, slug: 'favourites', name: 'Favourites', items: 2 },
      { id: 9, slug: 'later', name: 'Later', items: 0 },
    ]);
  });

  it('leaves out sections whose sources are missing', () => {
    expect(computeMetrics(new Snapshot())).toEqual({ summary: {}, playsByMonth: [] });
  });

  it('rejects malformed history', () => {
    const snapshot = new Snapshot();
    snapshot.setJson('watched/history.json', [{ id: 1, watched_at: '2024-01-01T00:00:00.000Z', type: 'show' }]);

    expect(() => computeMetrics(snapshot)).toThrow('watched/history.json[0].type must be one of movie, episode');
  });
});

describe('addMetrics', () => {
  it('writes the summary and the monthly CSV into the snapshot', () => {
    const snapshot = sampleSnapshot();

    addMetrics(snapshot);

    expect(snapshot.content(PLAYS_BY_MONTH_FILE)).toBe(
      'month,movies,episodes,total\n2023-12,1,0,1\n2024-01,0,2,2\n2024-03,1,0,1\n',
    );
    expect(snapshot.content(SUMMARY_FILE)).toContain('"episodes": 3');
  });

  it('produces the same files for the same input', () => {
    const first = sampleSnapshot();
    const second = sampleSnapshot();

    addMetrics(first);
    addMetrics(second);

    expect(second.content(SUMMARY_FILE)).toBe(first.content(SUMMARY_FILE));
  });
});

describe('formatCsv', () => {
  it('quotes values with commas, quotes or newlines', () => {
    expect(formatCsv(['name', 'count'], [{ name: 'Love, Death "and" Robots', count: 2 }])).toBe(
      'name,count\n"Love, Death ""and"" Robots",2\n',
    );
    expect(formatCsv(['name'], [{ name: 'two\nlines' }])).toBe('name\n"two lines"\n');
  });
});
