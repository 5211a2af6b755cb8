import { test, expect } from '@playwright/test';
import fs from 'fs';
import path from 'path';
import { histogramView, jobChartView, jobStackView, renderDashboard } from '../src/dashboard';
import type { AggregateBucket, JobSummary } from '../src/types';
import { tempDir } from './helpers';

const buckets: AggregateBucket[] = [
  { start: '2024-01-01T00:00:00.000Z', counts: { timeout: 1, assertion: 0 } },
  { start: '2024-01-02T00:00:00.000Z', counts: { timeout: 0, assertion: 2 } },
];

const jobs: JobSummary[] = [
  { jobName: 'e2e', logs: 4, failedLogs: 2, failureRate: 50, failures: 3, attempts: 6, attemptFailures: 2, attemptFailureRate: 33.33, byCategory: { assertion: 2, timeout: 1 } },
  { jobName: 'unit', logs: 4, failedLogs: 1, failureRate: 25, failures: 1, attempts: 0, attemptFailures: 0, attemptFailureRate: 0, byCategory: { assertion: 1 } },
  { jobName: 'build', logs: 4, failedLogs: 0, failureRate: 0, failures: 0, attempts: 0, attemptFailures: 0, attemptFailureRate: 0, byCategory: {} },
];

test('histogram stacks non-zero categories per bucket', () => {
  const view = histogramView(buckets);
  expect(view.maxCount).toBe(2);
  expect(view.width).toBe(66);
  expect(view.bars).toEqual([
    { x: 6, y: 120, width: 24, height: 120, color: '#d62728', title: '2024-01-01T00:00:00.000Z timeout: 1' },
    { x: 36, y: 0, width: 24, height: 240, color: '#ff7f0e', title: '2024-01-02T00:00:00.000Z assertion: 2' },
  ]);
  expect(view.labels).toEqual([
    { x: 18, text: '2024-01-01' },
    { x: 48, text: '2024-01-02' },
  ]);
  expect(view.legend).toEqual([
    { category: 'timeout', color: '#d62728', total: 1 },
    { category: 'assertion', color: '#ff7f0e', total: 2 },
  ]);
});

test('sub-day buckets are labelled with their time', () => {
  const view = histogramView([
    { start: '2024-01-01T00:00:00.000Z', counts: { timeout: 1 } },
    { start: '2024-01-01T06:00:00.000Z', counts: { timeout: 0 } },
  ]);
  expect(view.labels.map(l => l.text)).toEqual(['2024-01-01 00:00', '2024-01-01 06:00']);
});

test('job chart leaves out jobs without failures and marks mean and median', () => {
  const view = jobChartView(jobs);
  expect(view.rows).toEqual([
    { y: 0, width: 480, name: 'e2e', failures: 3, rate: 50 },
    { y: 22, width: 160, name: 'unit', failures: 1, rate: 25 },
  ]);
  expect(view.mean).toEqual({ x: 320, value: 2 });
  expect(view.median).toEqual({ x: 320, value: 2 });
});

test('job stacks split each failing job by category in histogram colours', () => {
  const view = jobStackView(jobs, ['timeout', 'assertion']);
  expect(view.rows).toEqual([
    {
      y: 0,
      name: 'e2e',
      segments: [
        { x: 0, width: 160, color: '#d62728', title: 'e2e timeout: 1' },
        { x: 160, width: 320, color: '#ff7f0e', title: 'e2e assertion: 2' },
      ],
    },
    { y: 22, name: 'unit', segments: [{ x: 0, width: 160, color: '#ff7f0e', title: 'unit assertion: 1' }] },
  ]);
  expect(view.legend).toEqual([
    { category: 'timeout', color: '#d62728' },
    { category: 'assertion', color: '#ff7f0e' },
  ]);
  expect(view.height).toBe(44);
});

test('job stacks sort categories when no order is given', () => {
  expect(jobStackView(jobs).legend.map(l => l.category)).toEqual(['assertion', 'timeout']);
});

test('renders the report with its stylesheet', async () => {
  const dir = await tempDir();
  const out = path.join(dir, 'report');
  const file = await renderDashboard(buckets, jobs, out, { generatedAt: '2024-01-03T00:00:00.000Z' });

  expect(file).toBe(path.join(out, 'failure_report.html'));
  const html = await fs.promises.readFile(file, 'utf-8');
  expect(html).toContain('Generated 2024-01-03T00:00:00.000Z');
  expect(html).toContain('<span id="total">3</span>');
  expect(html).toContain('<title>2024-01-02T00:00:00.000Z assertion: 2</title>');
  expect(html).toContain('<tr><td>unit</td><td>4</td><td>1</td><td>25%</td><td>1</td><td>0</td><td>0%</td></tr>');
  expect(html).toContain('<tr><td>e2e</td><td>4</td><td>2</td><td>50%</td><td>3</td><td>6</td><td>33.33%</td></tr>');
  expect(html).toContain('<title>e2e assertion: 2</title>');
  expect(fs.existsSync(path.join(out, 'report.css'))).toBe(true);
});

test('renders a notice when there is no data', async () => {
  const dir = await tempDir();
  const html = await fs.promises.readFile(await renderDashboard([], [], dir), 'utf-8');
  expect(html).toContain('No failures found in the scanned logs.');
  expect(html).not.toContain('<svg');
});
