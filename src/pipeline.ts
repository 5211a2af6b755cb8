import path from 'path';
import type { Logger } from 'pino';
import type { AggregateBucket, FailureRecord, JobSummary } from './types';
import { DEFAULT_RULESET, type RuleSet } from './rules';
import { collectRecords } from './walker';
import { aggregate, summarizeJobs } from './aggregate';
import { writeAggregatesCsv, writeJson, writeJsonl } from './io';
import { renderDashboard } from './dashboard';

export const RECORDS_FILE = 'records.jsonl';
export const AGGREGATES_FILE = 'aggregates.csv';
export const JOBS_FILE = 'jobs.json';

export type ReportOptions = {
  inputs: string[];
  bucketWidthMs: number;
  ruleset?: RuleSet;
  categories?: string[];
  outDir: string;
  chart: boolean;
  logger: Logger;
};

export type ReportResult = {
  runs: number;
  records: FailureRecord[];
  buckets: AggregateBucket[];
  jobs: JobSummary[];
  skipped: string[];
  files: string[];
};

/**
 * Scan, aggregate and persist. Nothing is written until every log has been scanned.
 */
export async function runReport(opts: ReportOptions): Promise<ReportResult> {
  const log = opts.logger;
  const ruleset = opts.ruleset ?? DEFAULT_RULESET;
  log.info({ inputs: opts.inputs, rulesetVersion: ruleset.version }, 'Scanning job logs');

  const collected = await collectRecords(opts.inputs, { rules: ruleset.rules, logger: log });
  const buckets = aggregate(collected.records, { bucketWidthMs: opts.bucketWidthMs, categories: opts.categories });
  const jobs = summarizeJobs(collected.scans);

  const files = [
    path.join(opts.outDir, RECORDS_FILE),
    path.join(opts.outDir, AGGREGATES_FILE),
    path.join(opts.outDir, JOBS_FILE),
  ];
  await writeJsonl(files[0], collected.records);
  await writeAggregatesCsv(files[1], buckets);
  await writeJson(files[2], jobs);

  if (opts.chart) {
    files.push(await renderDashboard(buckets, jobs, path.join(opts.outDir, 'report')));
  }

  log.info(
    { runs: collected.runs.length, records: collected.records.length, buckets: buckets.length, skipped: collected.skipped.length },
    'Report written'
  );
  return {
    runs: collected.runs.length,
    records: collected.records,
    buckets,
    jobs,
    skipped: collected.skipped,
    files,
  };
}
