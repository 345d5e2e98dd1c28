import { z } from 'zod';
import { ConfigError } from './exception/errors.js';

const PositiveInt = z.coerce.number().int().positive();

export const EngineConfigSchema = z.object({
  pollIntervalMs: PositiveInt.default(5000),
  maxPollAttempts: PositiveInt.default(720),
  logDir: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const VARIABLES: Record<string, string> = {
  pollIntervalMs: 'PLAYBOOK_POLL_INTERVAL_MS',
  maxPollAttempts: 'PLAYBOOK_MAX_POLL_ATTEMPTS',
};

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Read engine settings from the environment. Empty variables count as unset.
 * The region follows AWS_DEFAULT_REGION, then AWS_REGION.
 * Throws a ConfigError naming the first invalid variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const parsed = EngineConfigSchema.safeParse({
    pollIntervalMs: pick('PLAYBOOK_POLL_INTERVAL_MS'),
    maxPollAttempts: pick('PLAYBOOK_MAX_POLL_ATTEMPTS'),
    logDir: pick('PLAYBOOK_LOG_DIR'),
    region: pick('AWS_DEFAULT_REGION') ?? pick('AWS_REGION'),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = VARIABLES[String(issue.path[0])] ?? String(issue.path[0]);
    throw new ConfigError(`Invalid configuration: ${variable}: ${issue.message}`, variable);
  }
  return parsed.data;
}
