// apps/cli/src/config.ts
//
// Environment configuration. `.env` is loaded by the entry point through
// dotenv; this module only validates what ended up in process.env.
//
// Variables:
//   • LOG_LEVEL              → pino level, defaults to "info"
//   • CONNECTIONS_MEMO       → default for memoization (true/false/1/0)
//   • CONNECTIONS_MAX_NODES  → default search node limit
//
// CLI flags take precedence over all of these.

import { describeIssues } from '@connections/protocol';
import { z } from 'zod';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CONNECTIONS_MEMO: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((v) => v === 'true' || v === '1'),
  CONNECTIONS_MAX_NODES: z.coerce.number().int().positive().optional(),
});

export interface Config {
  logLevel: string;
  memoize: boolean;
  maxNodes?: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${describeIssues(parsed.error)}`);
  }
  const { LOG_LEVEL, CONNECTIONS_MEMO, CONNECTIONS_MAX_NODES } = parsed.data;
  return { logLevel: LOG_LEVEL, memoize: CONNECTIONS_MEMO, maxNodes: CONNECTIONS_MAX_NODES };
}
