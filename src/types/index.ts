/** Path into the `/sync/last_activities` payload, e.g. `['movies', 'watched_at']`. */
export type ActivityPath = readonly [string] | readonly [string, string];
