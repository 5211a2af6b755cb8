import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { AggregateBucket, JobSummary } from './types';
import { orderCategories } from './aggregate';

export const AGGREGATE_COLUMNS = ['bucket_start', 'category', 'count'];

export async function writeJsonl(file: string, rows: unknown[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  const out = rows.map((r) => JSON.stringify(r) + '\n').join('');
  await fs.promises.writeFile(file, out, 'utf-8');
}

export async function writeJson(file: string, value: unknown) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, JSON.stringify(value, null, 2) + '\n', 'utf-8');
}

// One row per (bucket, category), zero counts included.
export function aggregatesToCsv(buckets: AggregateBucket[]): string {
  const rows: (string | number)[][] = [];
  for (const b of buckets) {
    for (const [category, count] of Object.entries(b.counts)) rows.push([b.start, category, count]);
  }
  if (!rows.length) return AGGREGATE_COLUMNS.join(',') + '\n';
  return stringify(rows, { header: true, columns: AGGREGATE_COLUMNS });
}

export async function writeAggregatesCsv(file: string, buckets: AggregateBucket[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, aggregatesToCsv(buckets), 'utf-8');
}

const AggregateRow = z.object({
  bucket_start: z.string().refine(s => !Number.isNaN(Date.parse(s)), 'not a timestamp'),
  category: z.string().min(1),
  count: z.coerce.number().int().nonnegative(),
});

export async function readAggregatesCsv(file: string): Promise<AggregateBucket[]> {
  const rows: unknown[] = [];
  await new Promise<void>((resolve, reject) => {
    fs.createReadStream(file)
      .on('error', reject)
      .pipe(parse({ columns: true, trim: true, skip_empty_lines: true }))
      .on('data', (r: unknown) => rows.push(r))
      .on('end', () => resolve())
      .on('error', reject);
  });

  const byStart = new Map<string, Record<string, number>>();
  const found: string[] = [];
  rows.forEach((raw, i) => {
    const parsed = AggregateRow.safeParse(raw);
    if (!parsed.success) {
      throw new SyntaxError(`Invalid row ${i + 2} in ${path.basename(file)}: ${parsed.error.issues[0].message}`);
    }
    const { bucket_start, category, count } = parsed.data;
    const counts = byStart.get(bucket_start) ?? {};
    counts[category] = (counts[category] ?? 0) + count;
    byStart.set(bucket_start, counts);
    if (!found.includes(category)) found.push(category);
  });

  // keep the column order the file was written in
  const categories = orderCategories([], found);
  return [...byStart.entries()]
    .sort(([a], [b]) => Date.parse(a) - Date.parse(b))
    .map(([start, counts]) => ({
      start,
      counts: Object.fromEntries(categories.map(c => [c, counts[c] ?? 0])),
    }));
}

const JobSummaryRow = z.object({
  jobName: z.string(),
  logs: z.number().int().nonnegative(),
  failedLogs: z.number().int().nonnegative(),
  failureRate: z.number(),
  failures: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative().default(0),
  attemptFailures: z.number().int().nonnegative().default(0),
  attemptFailureRate: z.number().default(0),
  byCategory: z.record(z.number()),
});

export async function readJobSummaries(file: string): Promise<JobSummary[]> {
  const raw = await fs.promises.readFile(file, 'utf-8');
  return z.array(JobSummaryRow).parse(JSON.parse(raw));
}
