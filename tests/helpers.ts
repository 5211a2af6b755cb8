import fs from 'fs';
import os from 'os';
import path from 'path';
import { pino, type Logger } from 'pino';

export async function tempDir(prefix = 'ci-failures-') {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write a tree of files: keys are paths relative to root, values are file contents.
 * A key ending in "/" creates an empty directory.
 */
export async function writeTree(root: string, files: Record<string, string>) {
  for (const [rel, body] of Object.entries(files)) {
    const full = path.join(root, rel);
    if (rel.endsWith('/')) {
      await fs.promises.mkdir(full, { recursive: true });
      continue;
    }
    await fs.promises.mkdir(path.dirname(full), { recursive: true });
    await fs.promises.writeFile(full, body, 'utf-8');
  }
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function capturingLogger(): { logger: Logger; entries: Record<string, unknown>[] } {
  const entries: Record<string, unknown>[] = [];
  const logger = pino({ level: 'debug' }, { write: (msg: string) => { entries.push(JSON.parse(msg)); } });
  return { logger, entries };
}

export function manifest(id: number, createdAt: string, jobs: string[] = []) {
  return JSON.stringify({
    id,
    created_at: createdAt,
    status: 'completed',
    conclusion: 'failure',
    jobs: jobs.map((name, index) => ({ id: String(1000 + index), name, index })),
  });
}
