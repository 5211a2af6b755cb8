import fs from 'fs';
import path from 'path';
import fg from 'fast-glob';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { FailureRecord, Job, JobScan, Run } from './types';
import type { Rule } from './rules';
import { RULES } from './rules';
import { parseJobFile } from './fields';
import { scanLogFile } from './scanner';
import { compareText } from './aggregate';
import { InputNotFoundError, UnreadableLogError } from './errors';

export const RUN_DIR = /^run-(.+)$/;
export const MANIFEST_FILE = 'run.json';

const Manifest = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  created_at: z.string(),
  jobs: z
    .array(z.object({ id: z.union([z.string(), z.number()]).transform(String), index: z.number() }))
    .default([]),
});

async function isDir(p: string) {
  try {
    return (await fs.promises.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve inputs (run directories, parents of run directories, or glob patterns)
 * into a sorted, de-duplicated list of run directories.
 */
export async function discoverRunDirs(inputs: string[]): Promise<string[]> {
  const found = new Set<string>();

  for (const input of inputs) {
    const abs = path.resolve(input);
    if (await isDir(abs)) {
      if (RUN_DIR.test(path.basename(abs))) {
        found.add(abs);
        continue;
      }
      const entries = await fs.promises.readdir(abs, { withFileTypes: true });
      for (const e of entries) {
        if (e.isDirectory() && RUN_DIR.test(e.name)) found.add(path.join(abs, e.name));
      }
      continue;
    }

    const matches = await fg(input.replace(/\\/g, '/'), { onlyDirectories: true, absolute: true });
    for (const m of matches) {
      const dir = path.resolve(m);
      if (RUN_DIR.test(path.basename(dir))) found.add(dir);
    }
  }

  if (!found.size) throw new InputNotFoundError(inputs);
  return [...found].sort();
}

async function readManifest(dir: string, logger: Logger) {
  const file = path.join(dir, MANIFEST_FILE);
  let raw: string;
  try {
    raw = await fs.promises.readFile(file, 'utf-8');
  } catch {
    return undefined;
  }
  try {
    const parsed = Manifest.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn({ file }, 'Ignoring run manifest with unexpected shape');
  } catch {
    logger.warn({ file }, 'Ignoring run manifest that is not valid JSON');
  }
  return undefined;
}

export async function loadRun(dir: string, logger: Logger): Promise<{ run: Run; jobIds: Map<number, string> }> {
  const id = RUN_DIR.exec(path.basename(dir))?.[1] ?? path.basename(dir);
  const manifest = await readManifest(dir, logger);

  let createdAt = manifest ? new Date(manifest.created_at) : undefined;
  if (!createdAt || Number.isNaN(createdAt.getTime())) {
    createdAt = (await fs.promises.stat(dir)).mtime;
  }

  const jobIds = new Map<number, string>();
  for (const j of manifest?.jobs ?? []) jobIds.set(j.index, j.id);

  return { run: { id, createdAt, dir }, jobIds };
}

export async function listJobs(dir: string, jobIds = new Map<number, string>()): Promise<Job[]> {
  const jobs: Job[] = [];
  for (const name of await fs.promises.readdir(dir)) {
    const parsed = parseJobFile(name);
    if (!parsed) continue;
    jobs.push({
      id: jobIds.get(parsed.ordinal) ?? name.replace(/\.log$/, ''),
      name: parsed.name,
      ordinal: parsed.ordinal,
      path: path.join(dir, name),
    });
  }
  return jobs.sort((a, b) => a.ordinal - b.ordinal || compareText(a.path, b.path));
}

export type CollectOptions = {
  rules?: Rule[];
  logger: Logger;
};

export type Collected = {
  runs: Run[];
  scans: JobScan[];
  records: FailureRecord[];
  skipped: string[];
};

/**
 * Scan every job log under the given inputs exactly once.
 * Unreadable logs are skipped with a warning; an input with no run directories is fatal.
 */
export async function collectRecords(inputs: string[], opts: CollectOptions): Promise<Collected> {
  const rules = opts.rules ?? RULES;
  const log = opts.logger;
  const dirs = await discoverRunDirs(inputs);

  const runs: Run[] = [];
  const scans: JobScan[] = [];
  const skipped: string[] = [];

  for (const dir of dirs) {
    const { run, jobIds } = await loadRun(dir, log);
    runs.push(run);
    const jobs = await listJobs(dir, jobIds);
    if (!jobs.length) log.info({ run: run.id }, 'Run has no job logs');

    for (const job of jobs) {
      const ctx = { runId: run.id, jobId: job.id, jobName: job.name, runCreatedAt: run.createdAt };
      try {
        const { records, attempts } = await scanLogFile(job.path, ctx, rules);
        scans.push({ jobName: job.name, records, attempts });
        log.debug({ run: run.id, job: job.name, records: records.length, attempts }, 'Scanned job log');
      } catch (e) {
        if (!(e instanceof UnreadableLogError)) throw e;
        skipped.push(job.path);
        log.warn({ file: job.path, err: e.message }, 'Skipping unreadable job log');
      }
    }
  }

  return { runs, scans, skipped, records: scans.flatMap(s => s.records) };
}
