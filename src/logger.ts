import pino, { type Logger } from 'pino';

export type { Logger };

// stderr, so the CLI's own output on stdout stays clean
export function createRootLogger(level = 'info'): Logger {
  return pino(
    {
      level,
      base: { pid: undefined, hostname: undefined },
    },
    pino.destination(2)
  );
}

export function createLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}
