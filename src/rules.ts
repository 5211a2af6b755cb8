import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors';

export const UNCLASSIFIED = 'unclassified';

export const RULESET_VERSION = '1';

export type Rule = {
  name: string;
  pattern: RegExp;
  category: string;
};

export type RuleSet = {
  version: string;
  rules: Rule[];
};

// Order matters: the first rule that matches a line decides its category.
export const RULES: Rule[] = [
  { name: 'final-attempt', pattern: /Final attempt failed/, category: 'final-attempt' },
  { name: 'retry-attempt', pattern: /Attempt \d+ failed/, category: 'retry-attempt' },
  { name: 'test-failure', pattern: /Tests:\s+\d+ failed,/, category: 'test-failure' },
  {
    name: 'timeout',
    // not option names such as timeout_minutes or --testTimeout
    pattern: /\btimed out\b|\btimeout (?:of|after|exceeded)\b|\bexceeded\s*\d+\s*ms\b/i,
    category: 'timeout',
  },
  {
    name: 'network',
    pattern: /ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|ETIMEDOUT|socket hang up|connection refused|network error/i,
    category: 'network',
  },
  { name: 'assertion', pattern: /AssertionError|assertion failed|expected .+ to /i, category: 'assertion' },
  { name: 'error-annotation', pattern: /##\[error\]|\bERROR:|\bError:/, category: UNCLASSIFIED },
];

// Retry-wrapper signatures that count against a job's attempts.
export const ATTEMPT_FAILURE_RULES = ['final-attempt', 'retry-attempt', 'test-failure'];

// The retry wrapper stops after this many attempts.
export const MAX_ATTEMPT_FAILURES = 3;

export const DEFAULT_RULESET: RuleSet = { version: RULESET_VERSION, rules: RULES };

export function matchRule(line: string, rules: Rule[]): Rule | undefined {
  for (const rule of rules) {
    if (rule.pattern.test(line)) return rule;
  }
  return undefined;
}

const RuleFile = z.object({
  version: z.string().min(1),
  rules: z
    .array(
      z.object({
        name: z.string().min(1),
        pattern: z.string().min(1),
        flags: z.string().regex(/^[imsu]*$/, 'only i, m, s and u flags are allowed').optional(),
        category: z.string().optional(),
      })
    )
    .min(1),
});

export function compileRules(input: unknown): RuleSet {
  const parsed = RuleFile.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid rule file: ${issues}`);
  }

  const rules = parsed.data.rules.map(r => {
    let pattern: RegExp;
    try {
      pattern = new RegExp(r.pattern, r.flags);
    } catch (e) {
      throw new ConfigError(`Rule "${r.name}" has an invalid pattern: ${e instanceof Error ? e.message : String(e)}`);
    }
    const category = r.category?.trim() || UNCLASSIFIED;
    return { name: r.name, pattern, category };
  });

  return { version: parsed.data.version, rules };
}

export async function loadRuleFile(file: string): Promise<RuleSet> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(file, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Cannot read rule file ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Rule file ${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return compileRules(json);
}
