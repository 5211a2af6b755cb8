// Helpers that pull structured values out of raw CI log lines and log file names

const ANSI = /\u001b\[[0-9;]*[A-Za-z]/g;

const ISO_TS = /(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:[.,](\d+))?(Z|[+-]\d{2}(?::?\d{2})?)?/;

const DURATION = /\b(?:after|in|took|exceeded|time:|timeout of)\s*(\d+(?:\.\d+)?)\s*(ms|milliseconds?|seconds?|secs?|s|minutes?|mins?|m)\b/i;

const ATTEMPT_DONE = /Command completed after \d+ attempt/;

const ATTEMPT_LINE = /Attempt \d+\s*$/;

const JOB_FILE = /^(\d+)-(.+)\.log$/;

export function stripAnsi(line: string): string {
  return line.replace(ANSI, '');
}

/**
 * First ISO-8601 timestamp in the line, in epoch milliseconds.
 * `undefined` when the line has none, `null` when it has one that does not denote a real instant.
 */
export function extractTimestamp(line: string): number | null | undefined {
  const m = ISO_TS.exec(line);
  if (!m) return undefined;
  const [, y, mo, d, h, mi, s, frac, zone] = m;

  const month = Number(mo), day = Number(d), hour = Number(h), minute = Number(mi), second = Number(s);
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) return null;

  const ms = (frac || '').slice(0, 3).padEnd(3, '0');
  let tz = zone || 'Z';
  if (tz.length === 3) tz = `${tz}:00`;
  else if (tz !== 'Z' && !tz.includes(':')) tz = `${tz.slice(0, 3)}:${tz.slice(3)}`;

  const t = Date.parse(`${y}-${mo}-${d}T${h}:${mi}:${s}.${ms}${tz}`);
  if (Number.isNaN(t)) return null;
  // Date.parse rolls Feb 30 over into March
  if (new Date(Date.UTC(Number(y), month - 1, day)).getUTCDate() !== day) return null;
  return t;
}

export function extractDurationMs(line: string): number | undefined {
  const m = DURATION.exec(line);
  if (!m) return undefined;
  const value = Number(m[1]);
  const unit = m[2].toLowerCase();
  if (unit === 'ms' || unit.startsWith('millisecond')) return Math.round(value);
  if (unit === 'm' || unit.startsWith('min')) return Math.round(value * 60_000);
  return Math.round(value * 1000);
}

/**
 * Whether the line marks one attempt of a retry-wrapped command: the start of an attempt
 * or the final "Command completed after N attempts" line.
 */
export function isAttemptMarker(line: string): boolean {
  return ATTEMPT_DONE.test(line) || ATTEMPT_LINE.test(line);
}

export function parseJobFile(file: string): { ordinal: number; name: string } | undefined {
  const m = JOB_FILE.exec(file);
  if (!m) return undefined;
  return { ordinal: Number(m[1]), name: m[2].replace(/_/g, ' ') };
}
