import type { StoredLogRecord } from "../sink/memory";

export interface MetricSample {
  /** Epoch milliseconds of the start of the bucket */
  readonly periodStart: number;
  readonly value: number;
}

export interface ExtractOptions {
  /** Literal text counted once per matching record */
  pattern: string;
  periodSeconds: number;
}

export function periodStartOf(timestamp: number, periodSeconds: number): number {
  const periodMs = periodSeconds * 1000;
  return Math.floor(timestamp / periodMs) * periodMs;
}

/**
 * Count pattern matches per fixed window, the way a log metric filter with a
 * default value of 0 does: a window that received any log record gets a
 * sample (possibly 0), a window with no records gets none.
 */
export function extractMetric(
  records: readonly StoredLogRecord[],
  options: ExtractOptions,
): MetricSample[] {
  const buckets = new Map<number, number>();

  for (const record of records) {
    const start = periodStartOf(record.timestamp, options.periodSeconds);
    const matched = record.text.includes(options.pattern) ? 1 : 0;
    buckets.set(start, (buckets.get(start) ?? 0) + matched);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a - b)
    .map(([periodStart, value]) => ({ periodStart, value }));
}
