import { isRecord, jot } from '../jot.js';
import type { Logger } from '../logger.js';

const showIdsSchema = jot.object({ ids: jot.object({ trakt: jot.number({ integer: true }) }) });

const progressSchema = jot.object({
  aired: jot.number({ integer: true, min: 0 }),
  completed: jot.number({ integer: true, min: 0 }),
  last_watched_at: jot.unknown(),
  reset_at: jot.unknown(),
  next_episode: jot.unknown(),
  last_episode: jot.unknown(),
});

const hiddenItemsSchema = jot.array(jot.object({ show: jot.optional(showIdsSchema) }));

export interface ShowProgress {
  show: { ids: { trakt: number } };
  progress: unknown;
}

/** Trakt ids of every show named in the given hidden-item payloads. */
export function hiddenShowIds(payloads: ReadonlyMap<string, unknown>): Set<number> {
  const ids = new Set<number>();
  for (const [file, payload] of payloads) {
    for (const item of hiddenItemsSchema.parse(payload, file)) {
      if (item.show) {
        ids.add(item.show.ids.trakt);
      }
    }
  }
  return ids;
}

/**
 * Shows with an aired episode left to watch, in the order of `progress`.
 * Hidden shows, fully watched shows and shows without a next episode are left out.
 */
export function upNextShows(
  progress: readonly ShowProgress[],
  plays: ReadonlyMap<number, number>,
  hidden: ReadonlySet<number>,
  logger: Logger,
  file: string,
): unknown[] {
  const result: unknown[] = [];

  for (const [index, entry] of progress.entries()) {
    const id = entry.show.ids.trakt;
    const name = describeShow(entry.show);
    const state = progressSchema.parse(entry.progress, `${file}[${index}].progress`);

    if (hidden.has(id)) {
      logger.debug(`Skipping hidden show: ${name}`);
      continue;
    }
    if (state.aired === state.completed) {
      logger.debug(`Skipping show with all episodes completed: ${name}`);
      continue;
    }
    if (!isRecord(state.next_episode)) {
      logger.debug(`Skipping show with no next episode: ${name}`);
      continue;
    }

    result.push({
      show: entry.show,
      progress: {
        aired: state.aired,
        completed: state.completed,
        last_watched_at: state.last_watched_at,
        reset_at: state.reset_at,
        stats: { play_count: plays.get(id) ?? 0 },
        next_episode: state.next_episode,
        last_episode: state.last_episode,
      },
    });
  }

  return result;
}

function describeShow(show: ShowProgress['show']): string {
  return 'title' in show && typeof show.title === 'string' ? show.title : `#${show.ids.trakt}`;
}
