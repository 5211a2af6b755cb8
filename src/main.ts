#!/usr/bin/env node
import { loadEnv } from './config';
import { createRootLogger } from './logger';
import { runCli } from './cli';

async function main() {
  const env = loadEnv(process.env);
  const logger = createRootLogger(env.LOG_LEVEL);
  process.exitCode = await runCli(process.argv, { env, logger });
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
