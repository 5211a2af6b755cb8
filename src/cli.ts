import path from 'path';
import { Command } from 'commander';
import { createLogger, type Logger } from './logger';
import { type EnvConfig, parseBucketWidth, slackConfig } from './config';
import { ConfigError, GitHubActionsError, InputNotFoundError } from './errors';
import { loadRuleFile } from './rules';
import { runReport } from './pipeline';
import { readAggregatesCsv, readJobSummaries } from './io';
import { renderDashboard } from './dashboard';
import { postSlack, summaryText, type SlackPost } from './slack';
import { downloadWorkflowLogs, OctokitActionsApi, type ActionsApi } from './github';

const VERSION = '0.1.0';

export type CliDeps = {
  env: EnvConfig;
  logger: Logger;
  api?: ActionsApi;
  slack?: SlackPost;
  write?: (line: string) => void;
};

type DownloadFlags = { repo: string; workflow: string; days: string; output: string; limit: string };
type ReportFlags = { bucket: string; rules?: string; categories?: string; output: string; chart: boolean; slack: boolean };
type ChartFlags = { jobs?: string; output: string };

function positiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`${flag} must be a positive integer, got "${value}"`);
  return n;
}

/**
 * Errors the CLI reports as a message and exit code 1 rather than a stack trace.
 */
function isExpected(error: unknown): error is Error {
  return error instanceof InputNotFoundError || error instanceof ConfigError || error instanceof GitHubActionsError;
}

export function createProgram(deps: CliDeps): Command {
  const write = deps.write ?? ((line: string) => process.stdout.write(line + '\n'));
  const program = new Command();

  program
    .name('ci-failures')
    .description('Download GitHub Actions job logs, classify failures and chart them over time')
    .version(VERSION, '-v, --version', 'Output the current version')
    // set before adding commands so they inherit it
    .exitOverride();

  program
    .command('download')
    .description('Download job logs for recent runs of a workflow')
    .requiredOption('-r, --repo <owner/repo>', 'Repository in owner/repo format')
    .requiredOption('-w, --workflow <name>', 'Workflow name')
    .option('-d, --days <n>', 'Days to look back', '7')
    .option('-o, --output <dir>', 'Output directory', 'logs')
    .option('-l, --limit <n>', 'Maximum number of runs to fetch', '100')
    .action(async (flags: DownloadFlags) => {
      const api = deps.api ?? new OctokitActionsApi({ token: deps.env.GITHUB_TOKEN });
      const result = await downloadWorkflowLogs(
        api,
        {
          repo: flags.repo,
          workflow: flags.workflow,
          days: positiveInt(flags.days, '--days'),
          limit: positiveInt(flags.limit, '--limit'),
          output: flags.output,
        },
        createLogger(deps.logger, 'download')
      );
      write(`Downloaded ${result.logs} job logs from ${result.runs} runs into ${flags.output}`);
    });

  program
    .command('report')
    .description('Scan run-* directories for failures and write aggregates and charts')
    .argument('<inputs...>', 'run-* directories, their parent directories, or glob patterns')
    .option('-b, --bucket <width>', 'Histogram bucket width (e.g. 1d, 6h, 30m)', '1d')
    .option('--rules <file>', 'JSON rule table replacing the built-in rules')
    .option('--categories <list>', 'Comma-separated categories to always include, in order')
    .option('-o, --output <dir>', 'Output directory', 'out')
    .option('--no-chart', 'Skip the HTML report')
    .option('--slack', 'Post a summary to Slack when SLACK_BOT_TOKEN and SLACK_CHANNEL are set', false)
    .action(async (inputs: string[], flags: ReportFlags) => {
      const bucketWidthMs = parseBucketWidth(flags.bucket);
      const ruleset = flags.rules ? await loadRuleFile(flags.rules) : undefined;
      const categories = flags.categories?.split(',').map(c => c.trim()).filter(Boolean);

      const result = await runReport({
        inputs,
        bucketWidthMs,
        ruleset,
        categories,
        outDir: flags.output,
        chart: flags.chart,
        logger: createLogger(deps.logger, 'report'),
      });

      const summary = summaryText(result.buckets, result.runs);
      write(summary);
      for (const f of result.files) write(`Wrote ${f}`);
      if (flags.slack) await postSlack(summary, slackConfig(deps.env), createLogger(deps.logger, 'slack'), deps.slack);
    });

  program
    .command('chart')
    .description('Render the HTML report from a saved aggregates.csv')
    .argument('<aggregates>', 'aggregates.csv written by the report command')
    .option('--jobs <file>', 'jobs.json written by the report command')
    .option('-o, --output <dir>', 'Output directory', path.join('out', 'report'))
    .action(async (aggregatesFile: string, flags: ChartFlags) => {
      const buckets = await readAggregatesCsv(aggregatesFile);
      const jobs = flags.jobs ? await readJobSummaries(flags.jobs) : [];
      write(`Wrote ${await renderDashboard(buckets, jobs, flags.output)}`);
    });

  return program;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(args);
    return 0;
  } catch (error) {
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return 0;
    }
    if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number' && 'code' in error) {
      // commander already printed the usage error
      return error.exitCode;
    }
    if (isExpected(error)) {
      deps.logger.error({ err: error.message }, error.name);
      return 1;
    }
    throw error;
  }
}
