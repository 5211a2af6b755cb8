import fs from 'fs';
import type { FileHandle } from 'fs/promises';
import readline from 'readline';
import type { FailureRecord, JobContext, LogScan } from './types';
import type { Rule } from './rules';
import { matchRule } from './rules';
import { extractDurationMs, extractTimestamp, isAttemptMarker, stripAnsi } from './fields';
import { UnreadableLogError } from './errors';

const MAX_MESSAGE = 500;

/**
 * Turn log lines into failure records. Lines that match no rule are skipped;
 * a line whose timestamp is missing or malformed takes the run's creation time.
 */
export function scanLines(lines: Iterable<string>, ctx: JobContext, rules: Rule[]): FailureRecord[] {
  const out: FailureRecord[] = [];
  let n = 0;
  for (const raw of lines) {
    n++;
    const rec = scanLine(raw, n, ctx, rules);
    if (rec) out.push(rec);
  }
  return out;
}

function scanLine(raw: string, lineNo: number, ctx: JobContext, rules: Rule[]): FailureRecord | undefined {
  const line = stripAnsi(raw);
  const rule = matchRule(line, rules);
  if (!rule) return undefined;

  const ts = extractTimestamp(line);
  const rec: FailureRecord = {
    runId: ctx.runId,
    jobId: ctx.jobId,
    jobName: ctx.jobName,
    category: rule.category,
    rule: rule.name,
    timestamp: new Date(typeof ts === 'number' ? ts : ctx.runCreatedAt.getTime()).toISOString(),
    timestampSource: typeof ts === 'number' ? 'line' : 'run',
    line: lineNo,
    message: line.trim().slice(0, MAX_MESSAGE),
  };
  const durationMs = extractDurationMs(line);
  if (durationMs !== undefined) rec.durationMs = durationMs;
  return rec;
}

/**
 * Stream a job log from disk, collecting failure records and retry attempt markers.
 * Binary content yields nothing; a file that cannot be opened or read raises UnreadableLogError.
 */
export async function scanLogFile(file: string, ctx: JobContext, rules: Rule[]): Promise<LogScan> {
  const handle = await openLog(file);

  const stream = handle.createReadStream({ encoding: 'utf-8' });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });

  const out: FailureRecord[] = [];
  let attempts = 0;
  let n = 0;
  try {
    for await (const raw of rl) {
      n++;
      if (raw.includes('\u0000')) return { records: [], attempts: 0 };
      const rec = scanLine(raw, n, ctx, rules);
      if (rec) out.push(rec);
      if (isAttemptMarker(stripAnsi(raw))) attempts++;
    }
  } catch (e) {
    throw new UnreadableLogError(file, e instanceof Error ? e : undefined);
  } finally {
    rl.close();
    stream.destroy();
  }
  return { records: out, attempts };
}

async function openLog(file: string): Promise<FileHandle> {
  let handle: FileHandle | undefined;
  try {
    handle = await fs.promises.open(file, 'r');
    const stat = await handle.stat();
    if (!stat.isFile()) throw new Error('not a regular file');
    return handle;
  } catch (e) {
    await handle?.close();
    throw new UnreadableLogError(file, e instanceof Error ? e : undefined);
  }
}
