/**
 * Log acquisition: list a workflow's recent runs through the GitHub Actions REST API and write
 * each job's log to `<output>/run-<id>/<ordinal>-<job_name>.log`, with a `run.json` manifest.
 */
import fs from 'fs';
import path from 'path';
import { Octokit } from '@octokit/rest';
import type { Logger } from 'pino';
import type { RunManifest } from './types';
import { GitHubActionsError } from './errors';
import { MANIFEST_FILE } from './walker';

export type WorkflowRef = { id: number; name: string };
export type WorkflowRunRef = { id: number; created_at: string; status: string | null; conclusion: string | null };
export type JobRef = { id: number; name: string };

/**
 * The slice of the Actions API the downloader needs.
 */
export interface ActionsApi {
  listWorkflows(owner: string, repo: string): Promise<WorkflowRef[]>;
  listWorkflowRuns(owner: string, repo: string, workflowId: number, created: string, limit: number): Promise<WorkflowRunRef[]>;
  listJobs(owner: string, repo: string, runId: number): Promise<JobRef[]>;
  downloadJobLog(owner: string, repo: string, jobId: number): Promise<string>;
}

const PER_PAGE = 100;

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function wrap(message: string, error: unknown): GitHubActionsError {
  if (error instanceof GitHubActionsError) return error;
  const cause = error instanceof Error ? error : undefined;
  return new GitHubActionsError(`${message}${cause ? `: ${cause.message}` : ''}`, statusOf(error), cause);
}

export class OctokitActionsApi implements ActionsApi {
  private readonly octokit: Octokit;

  constructor(options: { token?: string; octokit?: Octokit }) {
    if (options.octokit) {
      this.octokit = options.octokit;
    } else {
      if (!options.token) {
        throw new GitHubActionsError('GitHub token is required. Set the GITHUB_TOKEN environment variable.');
      }
      this.octokit = new Octokit({ auth: options.token, userAgent: 'ci-failure-histogram' });
    }
  }

  async listWorkflows(owner: string, repo: string): Promise<WorkflowRef[]> {
    try {
      const out: WorkflowRef[] = [];
      for (let page = 1; ; page++) {
        const { data } = await this.octokit.actions.listRepoWorkflows({ owner, repo, per_page: PER_PAGE, page });
        out.push(...data.workflows.map(w => ({ id: w.id, name: w.name })));
        if (data.workflows.length < PER_PAGE) return out;
      }
    } catch (error) {
      throw wrap(`Failed to list workflows for ${owner}/${repo}`, error);
    }
  }

  async listWorkflowRuns(owner: string, repo: string, workflowId: number, created: string, limit: number): Promise<WorkflowRunRef[]> {
    try {
      const out: WorkflowRunRef[] = [];
      for (let page = 1; out.length < limit; page++) {
        const { data } = await this.octokit.actions.listWorkflowRuns({
          owner,
          repo,
          workflow_id: workflowId,
          created,
          per_page: Math.min(PER_PAGE, limit),
          page,
        });
        for (const run of data.workflow_runs) {
          if (out.length >= limit) break;
          out.push({ id: run.id, created_at: run.created_at, status: run.status ?? null, conclusion: run.conclusion ?? null });
        }
        if (data.workflow_runs.length < Math.min(PER_PAGE, limit)) break;
      }
      return out;
    } catch (error) {
      throw wrap(`Failed to list runs for workflow ${workflowId}`, error);
    }
  }

  async listJobs(owner: string, repo: string, runId: number): Promise<JobRef[]> {
    try {
      const out: JobRef[] = [];
      for (let page = 1; ; page++) {
        const { data } = await this.octokit.actions.listJobsForWorkflowRun({ owner, repo, run_id: runId, per_page: PER_PAGE, page });
        out.push(...data.jobs.map(j => ({ id: j.id, name: j.name })));
        if (data.jobs.length < PER_PAGE) return out;
      }
    } catch (error) {
      throw wrap(`Failed to list jobs for run ${runId}`, error);
    }
  }

  async downloadJobLog(owner: string, repo: string, jobId: number): Promise<string> {
    try {
      // Octokit follows the redirect to the log blob
      const response = await this.octokit.actions.downloadJobLogsForWorkflowRun({ owner, repo, job_id: jobId });
      const data: unknown = response.data;
      if (typeof data === 'string') return data;
      if (data instanceof ArrayBuffer) return new TextDecoder().decode(data);
      throw new GitHubActionsError(`Unexpected response format for job ${jobId} logs`);
    } catch (error) {
      throw wrap(`Failed to download logs for job ${jobId}`, error);
    }
  }
}

export type DownloadOptions = {
  repo: string;
  workflow: string;
  days: number;
  limit: number;
  output: string;
  now?: Date;
};

export type DownloadResult = {
  runs: number;
  logs: number;
  failed: number;
};

export function parseRepo(repo: string): { owner: string; name: string } {
  const m = /^([\w.-]+)\/([\w.-]+)$/.exec(repo.trim());
  if (!m) throw new GitHubActionsError(`Repository must be in owner/repo format, got "${repo}"`);
  return { owner: m[1], name: m[2] };
}

export function jobFileName(index: number, jobName: string): string {
  return `${index}-${jobName.replace(/[\\/]/g, '-').replace(/ /g, '_')}.log`;
}

export function createdSince(days: number, now: Date): string {
  const cutoff = new Date(now.getTime() - days * 86_400_000);
  return `>=${cutoff.toISOString().slice(0, 10)}`;
}

export async function findWorkflowId(api: ActionsApi, owner: string, repo: string, name: string): Promise<number> {
  const workflows = await api.listWorkflows(owner, repo);
  const match = workflows.find(w => w.name === name);
  if (!match) throw new GitHubActionsError(`Workflow '${name}' not found in repository '${owner}/${repo}'`, 404);
  return match.id;
}

/**
 * Download every job log of the workflow's runs from the last `days` days.
 * A run whose jobs cannot be listed, or a job whose log cannot be fetched, is logged,
 * counted in `failed` and skipped.
 */
export async function downloadWorkflowLogs(api: ActionsApi, opts: DownloadOptions, logger: Logger): Promise<DownloadResult> {
  const { owner, name: repo } = parseRepo(opts.repo);
  const workflowId = await findWorkflowId(api, owner, repo, opts.workflow);
  logger.info({ workflow: opts.workflow, workflowId }, 'Found workflow');

  const created = createdSince(opts.days, opts.now ?? new Date());
  const runs = await api.listWorkflowRuns(owner, repo, workflowId, created, opts.limit);
  logger.info({ runs: runs.length, created }, 'Listed workflow runs');

  await fs.promises.mkdir(opts.output, { recursive: true });
  const result: DownloadResult = { runs: runs.length, logs: 0, failed: 0 };

  for (const run of runs) {
    let jobs: JobRef[];
    try {
      jobs = await api.listJobs(owner, repo, run.id);
    } catch (error) {
      if (!(error instanceof GitHubActionsError)) throw error;
      result.failed++;
      logger.error({ run: run.id, err: error.message }, 'Error fetching jobs for run');
      continue;
    }

    const runDir = path.join(opts.output, `run-${run.id}`);
    await fs.promises.mkdir(runDir, { recursive: true });
    if (!jobs.length) logger.info({ run: run.id }, 'No jobs found for run');

    const manifest: RunManifest = {
      id: String(run.id),
      created_at: run.created_at,
      status: run.status,
      conclusion: run.conclusion,
      jobs: jobs.map((j, index) => ({ id: String(j.id), name: j.name, index })),
    };
    await fs.promises.writeFile(path.join(runDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');

    for (const [index, job] of jobs.entries()) {
      const file = path.join(runDir, jobFileName(index, job.name));
      try {
        const text = await api.downloadJobLog(owner, repo, job.id);
        await fs.promises.writeFile(file, text, 'utf-8');
        result.logs++;
        logger.debug({ run: run.id, job: job.name, file }, 'Log saved');
      } catch (error) {
        if (!(error instanceof GitHubActionsError)) throw error;
        result.failed++;
        logger.error({ run: run.id, job: job.id, err: error.message }, 'Error downloading job log');
      }
    }
  }

  logger.info({ ...result, output: opts.output }, 'Download finished');
  return result;
}
