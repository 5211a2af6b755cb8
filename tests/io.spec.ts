import { test, expect } from '@playwright/test';
import fs from 'fs';
import path from 'path';
import { aggregatesToCsv, readAggregatesCsv, readJobSummaries, writeAggregatesCsv, writeJson, writeJsonl } from '../src/io';
import type { AggregateBucket } from '../src/types';
import { tempDir } from './helpers';

const buckets: AggregateBucket[] = [
  { start: '2024-01-01T00:00:00.000Z', counts: { timeout: 1, assertion: 0 } },
  { start: '2024-01-02T00:00:00.000Z', counts: { timeout: 0, assertion: 2 } },
];

test('aggregates are one row per bucket and category, zeros included', () => {
  expect(aggregatesToCsv(buckets)).toBe(
    'bucket_start,category,count\n' +
      '2024-01-01T00:00:00.000Z,timeout,1\n' +
      '2024-01-01T00:00:00.000Z,assertion,0\n' +
      '2024-01-02T00:00:00.000Z,timeout,0\n' +
      '2024-01-02T00:00:00.000Z,assertion,2\n'
  );
});

test('an empty aggregate is just the header', () => {
  expect(aggregatesToCsv([])).toBe('bucket_start,category,count\n');
});

test('aggregates read back from disk', async () => {
  const dir = await tempDir();
  const file = path.join(dir, 'out', 'aggregates.csv');
  await writeAggregatesCsv(file, buckets);
  expect(await readAggregatesCsv(file)).toEqual(buckets);
});

test('reading rejects a bad count', async () => {
  const dir = await tempDir();
  const file = path.join(dir, 'aggregates.csv');
  await fs.promises.writeFile(file, 'bucket_start,category,count\n2024-01-01T00:00:00.000Z,timeout,-3\n');
  await expect(readAggregatesCsv(file)).rejects.toThrow(/row 2/);
});

test('records are written one JSON object per line', async () => {
  const dir = await tempDir();
  const file = path.join(dir, 'records.jsonl');
  await writeJsonl(file, [{ a: 1 }, { b: 'x' }]);
  expect(await fs.promises.readFile(file, 'utf-8')).toBe('{"a":1}\n{"b":"x"}\n');
  await writeJsonl(file, []);
  expect(await fs.promises.readFile(file, 'utf-8')).toBe('');
});

test('job summaries read back through the schema', async () => {
  const dir = await tempDir();
  const file = path.join(dir, 'jobs.json');
  const jobs = [
    {
      jobName: 'e2e',
      logs: 2,
      failedLogs: 1,
      failureRate: 50,
      failures: 3,
      attempts: 4,
      attemptFailures: 1,
      attemptFailureRate: 25,
      byCategory: { timeout: 3 },
    },
  ];
  await writeJson(file, jobs);
  expect(await readJobSummaries(file)).toEqual(jobs);
  await writeJson(file, [{ jobName: 'e2e' }]);
  await expect(readJobSummaries(file)).rejects.toThrow();
});

test('job summaries without attempt counts read back as zero attempts', async () => {
  const dir = await tempDir();
  const file = path.join(dir, 'jobs.json');
  await writeJson(file, [{ jobName: 'unit', logs: 1, failedLogs: 0, failureRate: 0, failures: 0, byCategory: {} }]);
  expect(await readJobSummaries(file)).toEqual([
    {
      jobName: 'unit',
      logs: 1,
      failedLogs: 0,
      failureRate: 0,
      failures: 0,
      attempts: 0,
      attemptFailures: 0,
      attemptFailureRate: 0,
      byCategory: {},
    },
  ]);
});
