import type { AggregateBucket, FailureRecord, JobScan, JobSummary } from './types';
import { ATTEMPT_FAILURE_RULES, MAX_ATTEMPT_FAILURES } from './rules';

export type AggregateOptions = {
  bucketWidthMs: number;
  // fixed categories first, in this order; categories only seen in the data follow, sorted
  categories?: string[];
};

export function orderCategories(found: Iterable<string>, fixed?: string[]): string[] {
  const seen = new Set(fixed ?? []);
  const extra = [...new Set(found)].filter(c => !seen.has(c)).sort();
  return [...(fixed ?? []), ...extra];
}

// code-unit order, so output does not depend on the host locale
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function emptyCounts(categories: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const c of categories) counts[c] = 0;
  return counts;
}

/**
 * Count records per [start, start + width) bucket and category. Buckets are aligned to the
 * epoch grid, contiguous from the earliest record to the latest, and every bucket lists every
 * category, zeros included.
 */
export function aggregate(records: FailureRecord[], opts: AggregateOptions): AggregateBucket[] {
  const width = opts.bucketWidthMs;
  if (!(width > 0) || !Number.isFinite(width)) throw new RangeError(`bucket width must be positive, got ${width}`);
  if (!records.length) return [];

  const times = records.map(r => Date.parse(r.timestamp));
  let min = Infinity, max = -Infinity;
  for (const t of times) {
    if (t < min) min = t;
    if (t > max) max = t;
  }

  const start = Math.floor(min / width) * width;
  const n = Math.floor((max - start) / width) + 1;
  const categories = orderCategories(records.map(r => r.category), opts.categories);

  const buckets: AggregateBucket[] = [];
  for (let i = 0; i < n; i++) {
    buckets.push({ start: new Date(start + i * width).toISOString(), counts: emptyCounts(categories) });
  }

  records.forEach((r, i) => {
    const idx = Math.floor((times[i] - start) / width);
    buckets[idx].counts[r.category]++;
  });

  return buckets;
}

/**
 * Sum partial aggregates built with the same bucket width into one contiguous series.
 */
export function mergeBuckets(partials: AggregateBucket[][], bucketWidthMs: number, fixed?: string[]): AggregateBucket[] {
  const totals = new Map<number, Record<string, number>>();
  const found = new Set<string>();

  for (const part of partials) {
    for (const b of part) {
      const t = Date.parse(b.start);
      if (t % bucketWidthMs !== 0) throw new RangeError(`bucket ${b.start} is not on a ${bucketWidthMs}ms grid`);
      const acc = totals.get(t) ?? {};
      for (const [cat, count] of Object.entries(b.counts)) {
        found.add(cat);
        acc[cat] = (acc[cat] ?? 0) + count;
      }
      totals.set(t, acc);
    }
  }
  if (!totals.size) return [];

  const keys = [...totals.keys()];
  const first = Math.min(...keys), last = Math.max(...keys);
  const categories = orderCategories(found, fixed);

  const out: AggregateBucket[] = [];
  for (let t = first; t <= last; t += bucketWidthMs) {
    const counts = emptyCounts(categories);
    for (const [cat, count] of Object.entries(totals.get(t) ?? {})) counts[cat] = count;
    out.push({ start: new Date(t).toISOString(), counts });
  }
  return out;
}

export function totalsByCategory(buckets: AggregateBucket[]): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const b of buckets) {
    for (const [cat, count] of Object.entries(b.counts)) totals[cat] = (totals[cat] ?? 0) + count;
  }
  return totals;
}

export function failureRate(failed: number, total: number): number {
  return total > 0 ? Math.round((failed / total) * 10000) / 100 : 0;
}

export function summarizeJobs(scans: JobScan[]): JobSummary[] {
  const byName = new Map<string, JobSummary>();
  for (const s of scans) {
    const sum = byName.get(s.jobName) ?? {
      jobName: s.jobName,
      logs: 0,
      failedLogs: 0,
      failureRate: 0,
      failures: 0,
      attempts: 0,
      attemptFailures: 0,
      attemptFailureRate: 0,
      byCategory: {},
    };
    sum.logs++;
    if (s.records.length) sum.failedLogs++;
    sum.failures += s.records.length;
    sum.attempts += s.attempts;
    const retryFailures = s.records.filter(r => ATTEMPT_FAILURE_RULES.includes(r.rule)).length;
    sum.attemptFailures += Math.min(retryFailures, MAX_ATTEMPT_FAILURES);
    for (const r of s.records) sum.byCategory[r.category] = (sum.byCategory[r.category] ?? 0) + 1;
    byName.set(s.jobName, sum);
  }

  const rows = [...byName.values()];
  for (const row of rows) {
    row.failureRate = failureRate(row.failedLogs, row.logs);
    row.attemptFailureRate = failureRate(row.attemptFailures, row.attempts);
    row.byCategory = Object.fromEntries(Object.entries(row.byCategory).sort(([a], [b]) => compareText(a, b)));
  }
  return rows.sort((a, b) => b.failures - a.failures || compareText(a.jobName, b.jobName));
}

export function mean(values: number[]): number {
  return values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

export function median(values: number[]): number {
  if (!values.length) return 0;
  const s = [...values].sort((a, b) => a - b);
  const mid = Math.floor(s.length / 2);
  return s.length % 2 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}
