import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import type { AggregateBucket, JobSummary } from './types';
import { mean, median, orderCategories, totalsByCategory } from './aggregate';
import { DAY_MS } from './config';

export const TEMPLATE_DIR = path.join(__dirname, 'templates');

const PALETTE = ['#d62728', '#ff7f0e', '#9467bd', '#1f77b4', '#2ca02c', '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf'];

export type Bar = { x: number; y: number; width: number; height: number; color: string; title: string };

export type HistogramView = {
  width: number;
  height: number;
  bars: Bar[];
  labels: { x: number; text: string }[];
  legend: { category: string; color: string; total: number }[];
  maxCount: number;
};

export type JobChartView = {
  width: number;
  height: number;
  rows: { y: number; width: number; name: string; failures: number; rate: number }[];
  mean: { x: number; value: number };
  median: { x: number; value: number };
};

export type JobStackView = {
  width: number;
  height: number;
  rows: { y: number; name: string; segments: { x: number; width: number; color: string; title: string }[] }[];
  legend: { category: string; color: string }[];
};

const PLOT_H = 240;
const BAR_W = 24;
const GAP = 6;

export function colorFor(index: number) {
  return PALETTE[index % PALETTE.length];
}

// Buckets narrower than a day get a time in their label.
function isSubDay(buckets: AggregateBucket[]): boolean {
  if (buckets.length > 1 && Date.parse(buckets[1].start) - Date.parse(buckets[0].start) < DAY_MS) return true;
  return buckets.some(b => Date.parse(b.start) % DAY_MS !== 0);
}

// Stacked bars: one column per bucket, one segment per non-zero category.
export function histogramView(buckets: AggregateBucket[]): HistogramView {
  const categories = buckets.length ? Object.keys(buckets[0].counts) : [];
  const totals = totalsByCategory(buckets);
  const maxCount = Math.max(1, ...buckets.map(b => Object.values(b.counts).reduce((a, c) => a + c, 0)));
  const scale = PLOT_H / maxCount;
  const subDay = isSubDay(buckets);

  const bars: Bar[] = [];
  const labels: HistogramView['labels'] = [];
  buckets.forEach((b, i) => {
    const x = GAP + i * (BAR_W + GAP);
    let y = PLOT_H;
    categories.forEach((cat, ci) => {
      const count = b.counts[cat] ?? 0;
      if (!count) return;
      const h = count * scale;
      y -= h;
      bars.push({ x, y, width: BAR_W, height: h, color: colorFor(ci), title: `${b.start} ${cat}: ${count}` });
    });
    labels.push({ x: x + BAR_W / 2, text: subDay ? b.start.slice(0, 16).replace('T', ' ') : b.start.slice(0, 10) });
  });

  return {
    width: GAP + buckets.length * (BAR_W + GAP),
    height: PLOT_H,
    bars,
    labels,
    legend: categories.map((category, ci) => ({ category, color: colorFor(ci), total: totals[category] ?? 0 })),
    maxCount,
  };
}

const ROW_H = 22;
const CHART_W = 480;

// Horizontal bars per job name with mean and median marker lines.
export function jobChartView(jobs: JobSummary[]): JobChartView {
  const failing = jobs.filter(j => j.failures > 0);
  const counts = failing.map(j => j.failures);
  const max = Math.max(1, ...counts);
  const scale = CHART_W / max;
  const avg = Math.round(mean(counts));
  const mid = Math.round(median(counts));

  return {
    width: CHART_W,
    height: failing.length * ROW_H,
    rows: failing.map((j, i) => ({ y: i * ROW_H, width: j.failures * scale, name: j.jobName, failures: j.failures, rate: j.failureRate })),
    mean: { x: avg * scale, value: avg },
    median: { x: mid * scale, value: mid },
  };
}

// One stacked row per failing job, one segment per category, coloured like the histogram legend.
export function jobStackView(jobs: JobSummary[], categories: string[] = []): JobStackView {
  const failing = jobs.filter(j => j.failures > 0);
  const all = orderCategories(failing.flatMap(j => Object.keys(j.byCategory)), categories);
  const scale = CHART_W / Math.max(1, ...failing.map(j => j.failures));

  return {
    width: CHART_W,
    height: failing.length * ROW_H,
    rows: failing.map((j, i) => {
      let x = 0;
      const segments: JobStackView['rows'][number]['segments'] = [];
      all.forEach((cat, ci) => {
        const count = j.byCategory[cat] ?? 0;
        if (!count) return;
        segments.push({ x, width: count * scale, color: colorFor(ci), title: `${j.jobName} ${cat}: ${count}` });
        x += count * scale;
      });
      return { y: i * ROW_H, name: j.jobName, segments };
    }),
    legend: all.map((category, ci) => ({ category, color: colorFor(ci) })),
  };
}

export async function renderDashboard(
  buckets: AggregateBucket[],
  jobs: JobSummary[],
  outDir = 'out/report',
  opts: { title?: string; generatedAt?: string; templateDir?: string } = {}
) {
  const templateDir = opts.templateDir ?? TEMPLATE_DIR;
  const tpl = await fs.promises.readFile(path.join(templateDir, 'report.ejs'), 'utf-8');
  const html = ejs.render(tpl, {
    title: opts.title ?? 'CI failures',
    generatedAt: opts.generatedAt ?? new Date().toISOString(),
    total: buckets.reduce((n, b) => n + Object.values(b.counts).reduce((a, c) => a + c, 0), 0),
    histogram: histogramView(buckets),
    jobChart: jobChartView(jobs),
    jobStack: jobStackView(jobs, buckets.length ? Object.keys(buckets[0].counts) : []),
    jobs,
    empty: buckets.length === 0,
  });

  await fs.promises.mkdir(outDir, { recursive: true });
  const outFile = path.join(outDir, 'failure_report.html');
  await fs.promises.writeFile(outFile, html, 'utf-8');
  await fs.promises.copyFile(path.join(templateDir, 'report.css'), path.join(outDir, 'report.css'));
  return outFile;
}
