import { describe, expect, it } from 'vitest';
import { formatBytes, parseByteSize } from './size.js';
import { formatDuration, parseDuration, toEpochMs } from './time.js';

describe('parseDuration', () => {
  it('accepts zero and the empty string', () => {
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('')).toBe(0);
  });

  it('converts each unit', () => {
    expect(parseDuration('45s')).toBe(45_000);
    expect(parseDuration('30m')).toBe(1_800_000);
    expect(parseDuration('12h')).toBe(43_200_000);
    expect(parseDuration('1d')).toBe(86_400_000);
  });

  it('rejects unknown units', () => {
    expect(() => parseDuration('3w')).toThrow('Invalid duration: 3w');
  });
});

describe('formatDuration', () => {
  it('prints hours, minutes and seconds', () => {
    expect(formatDuration(3_723_000)).toBe('1:02:03');
  });

  it('prints days', () => {
    expect(formatDuration(86_400_000)).toBe('1 day, 0:00:00');
    expect(formatDuration(2 * 86_400_000 + 5_000)).toBe('2 days, 0:00:05');
  });
});

describe('toEpochMs', () => {
  it('parses ISO timestamps', () => {
    expect(toEpochMs('2024-01-01T00:00:00.000Z')).toBe(1_704_067_200_000);
  });

  it('throws on garbage', () => {
    expect(() => toEpochMs('yesterday')).toThrow('Unable to parse time value: yesterday');
  });
});

describe('parseByteSize', () => {
  it('reads plain byte counts and suffixes', () => {
    expect(parseByteSize('100')).toBe(100);
    expect(parseByteSize('64KB')).toBe(65_536);
    expect(parseByteSize('1.5mb')).toBe(1_572_864);
    expect(parseByteSize('2 GB')).toBe(2_147_483_648);
  });

  it('rejects unknown suffixes', () => {
    expect(() => parseByteSize('10TB')).toThrow('Invalid size: 10TB');
  });
});

describe('formatBytes', () => {
  it('scales to the largest unit under 1024', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});
