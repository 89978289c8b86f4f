const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * Parses durations such as `0`, `45s`, `30m`, `12h` or `7d` into milliseconds.
 * An empty string means zero.
 */
export function parseDuration(value: string): number {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === '0') {
    return 0;
  }

  const match = /^(\d+)([smhd])$/.exec(trimmed);
  const unit = match?.[2];
  const multiplier = unit ? UNIT_MS[unit] : undefined;
  if (!match || multiplier === undefined) {
    throw new Error(`Invalid duration: ${value}`);
  }

  return Number(match[1]) * multiplier;
}

/** Formats milliseconds as `3:04:05`, prefixed with whole days when there are any. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const clock = `${hours}:${pad(minutes)}:${pad(seconds)}`;
  if (days === 0) {
    return clock;
  }
  return `${days} day${days === 1 ? '' : 's'}, ${clock}`;
}

export function toEpochMs(iso: string): number {
  const parsed = Date.parse(iso);
  if (Number.isNaN(parsed)) {
    throw new Error(`Unable to parse time value: ${iso}`);
  }
  return parsed;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}
