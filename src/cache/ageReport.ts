import type { CacheIndexEntry } from './cache.js';
import { formatBytes } from '../utils/size.js';
import { formatDuration, toEpochMs } from '../utils/time.js';

export interface AgeReport {
  count: number;
  meanMs: number;
  medianMs: number;
  p75Ms: number;
  p95Ms: number;
  p99Ms: number;
  minMs: number;
  maxMs: number;
}

/** Age distribution of cache entries relative to `now`, or null for an empty cache. */
export function summarizeAges(rows: CacheIndexEntry[], now: Date): AgeReport | null {
  const nowMs = now.getTime();
  const ages = rows.map((row) => Math.max(0, nowMs - toEpochMs(row.storedAt))).sort((a, b) => a - b);
  if (ages.length === 0) {
    return null;
  }

  const at = (fraction: number) => ages[Math.min(ages.length - 1, Math.floor(ages.length * fraction))] ?? 0;
  const total = ages.reduce((sum, age) => sum + age, 0);

  return {
    count: ages.length,
    meanMs: total / ages.length,
    medianMs: at(0.5),
    p75Ms: at(0.75),
    p95Ms: at(0.95),
    p99Ms: at(0.99),
    minMs: ages[0] ?? 0,
    maxMs: ages[ages.length - 1] ?? 0,
  };
}

export function formatAgeReport(report: AgeReport | null, totalSize: number): string[] {
  if (!report) {
    return ['Cache is empty'];
  }
  return [
    `Files: ${report.count}`,
    `Total size: ${formatBytes(totalSize)}`,
    `Mean age: ${formatDuration(report.meanMs)}`,
    `Median age: ${formatDuration(report.medianMs)}`,
    `75th percentile age: ${formatDuration(report.p75Ms)}`,
    `95th percentile age: ${formatDuration(report.p95Ms)}`,
    `99th percentile age: ${formatDuration(report.p99Ms)}`,
    `Min age: ${formatDuration(report.minMs)}`,
    `Max age: ${formatDuration(report.maxMs)}`,
  ];
}
