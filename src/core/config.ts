import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { Q3Policy } from './types.js';

/**
 * Runtime configuration from environment variables.
 *
 *   XBRL_QUARTERS_Q3_POLICY      cumulative_first (default) | direct_first
 *   XBRL_QUARTERS_ROUND_DERIVED  true (default) | false
 *   PORT                         HTTP port for the web API (default 3005)
 *
 * CLI flags and request parameters override these per call.
 */

export interface AppConfig {
  q3Policy: Q3Policy;
  roundDerived: boolean;
  port: number;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  XBRL_QUARTERS_Q3_POLICY: z.enum(['cumulative_first', 'direct_first']).default('cumulative_first'),
  XBRL_QUARTERS_ROUND_DERIVED: booleanFlag.default('true'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    XBRL_QUARTERS_Q3_POLICY: env.XBRL_QUARTERS_Q3_POLICY || undefined,
    XBRL_QUARTERS_ROUND_DERIVED: env.XBRL_QUARTERS_ROUND_DERIVED?.toLowerCase() || undefined,
    PORT: env.PORT || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.path.join('.') || 'env', issue.message);
  }

  return {
    q3Policy: parsed.data.XBRL_QUARTERS_Q3_POLICY,
    roundDerived: parsed.data.XBRL_QUARTERS_ROUND_DERIVED,
    port: parsed.data.PORT,
  };
}

export function parseQ3Policy(value: string): Q3Policy {
  const parsed = z.enum(['cumulative_first', 'direct_first']).safeParse(value);
  if (!parsed.success) {
    throw new ConfigError('q3-policy', `expected cumulative_first or direct_first, got "${value}"`);
  }
  return parsed.data;
}
