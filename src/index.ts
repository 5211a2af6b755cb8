export type { AggregateBucket, FailureRecord, Job, JobContext, JobScan, JobSummary, Run, RunManifest } from './types';
export { DEFAULT_RULESET, RULES, RULESET_VERSION, UNCLASSIFIED, compileRules, loadRuleFile, matchRule } from './rules';
export type { Rule, RuleSet } from './rules';
export { scanLines, scanLogFile } from './scanner';
export { collectRecords, discoverRunDirs, listJobs, loadRun } from './walker';
export { aggregate, mergeBuckets, summarizeJobs, totalsByCategory } from './aggregate';
export { aggregatesToCsv, readAggregatesCsv, readJobSummaries, writeAggregatesCsv } from './io';
export { renderDashboard } from './dashboard';
export { downloadWorkflowLogs, OctokitActionsApi } from './github';
export type { ActionsApi } from './github';
export { runReport } from './pipeline';
export { parseBucketWidth, loadEnv } from './config';
export { ConfigError, GitHubActionsError, InputNotFoundError, UnreadableLogError } from './errors';
