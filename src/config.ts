import { z } from 'zod';
import { ConfigError } from './errors';

const Env = z.object({
  GITHUB_TOKEN: z.string().min(1).optional(),
  SLACK_BOT_TOKEN: z.string().min(1).optional(),
  SLACK_CHANNEL: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type EnvConfig = z.infer<typeof Env>;

export type SlackConfig = { token?: string; channel?: string };

export function loadEnv(env: Record<string, string | undefined>): EnvConfig {
  const parsed = Env.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function slackConfig(env: EnvConfig): SlackConfig {
  return { token: env.SLACK_BOT_TOKEN, channel: env.SLACK_CHANNEL };
}

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

export const DAY_MS = UNIT_MS.d;

// "1d", "6h", "30m", "1w", "500ms"
export function parseBucketWidth(value: string): number {
  const m = /^\s*(\d+)\s*(ms|s|m|h|d|w)\s*$/i.exec(value);
  if (!m) throw new ConfigError(`Invalid bucket width "${value}" (expected e.g. 1d, 6h, 30m)`);
  const width = Number(m[1]) * UNIT_MS[m[2].toLowerCase()];
  if (width <= 0) throw new ConfigError(`Bucket width must be positive, got "${value}"`);
  return width;
}
