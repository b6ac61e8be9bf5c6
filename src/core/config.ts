/**
 * Reminder configuration
 *
 * Built once per invocation from the environment and passed explicitly into
 * the decision cycle.
 *
 * | env var                       | field              | default                                 |
 * | ----------------------------- | ------------------ | --------------------------------------- |
 * | CONTEXT_REMINDER_MAX_TOKENS   | maxContextTokens   | 200000                                  |
 * | CONTEXT_REMINDER_THRESHOLD    | thresholdFraction  | 0.95                                    |
 * | CONTEXT_REMINDER_STATE_DIR    | stateDir           | ~/.cache/claude-hooks                   |
 * | CONTEXT_REMINDER_COMMAND      | remediationCommand | /claude-md-management:revise-claude-md  |
 */

import { z } from 'zod';
import { getStateDir } from './paths.js';
import { logWarn } from './logger.js';

export const DEFAULT_MAX_CONTEXT_TOKENS = 200000;
export const DEFAULT_THRESHOLD_FRACTION = 0.95;
export const DEFAULT_REMEDIATION_COMMAND = '/claude-md-management:revise-claude-md';

export interface ReminderConfig {
  /** Context ceiling the usage percentage is computed against */
  maxContextTokens: number;
  /** Fraction of the ceiling at which advisories start (0.95 = 95%); may exceed 1 */
  thresholdFraction: number;
  /** Directory holding warned markers and logs */
  stateDir: string;
  /** Command suggested in the advisory */
  remediationCommand: string;
}

const MaxTokensSchema = z.coerce
  .number()
  .int('must be a whole number of tokens')
  .positive('must be greater than zero');

const ThresholdSchema = z.coerce
  .number()
  .positive('must be greater than 0');

const CommandSchema = z.string().trim().min(1, 'must not be empty');

/**
 * Parse one env value, falling back to the default when it is unset or invalid.
 */
function readSetting<T>(env: NodeJS.ProcessEnv, key: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    logWarn(`Invalid ${key}, using default`, {
      value: raw,
      default: fallback,
      issues: result.error.issues.map(issue => issue.message),
    });
    return fallback;
  }
  return result.data;
}

/**
 * Load configuration from environment variables.
 *
 * @example
 * ```ts
 * const config = loadConfig({ CONTEXT_REMINDER_THRESHOLD: '0.8' });
 * // config.thresholdFraction === 0.8, config.maxContextTokens === 200000
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReminderConfig {
  return {
    maxContextTokens: readSetting(env, 'CONTEXT_REMINDER_MAX_TOKENS', MaxTokensSchema, DEFAULT_MAX_CONTEXT_TOKENS),
    thresholdFraction: readSetting(env, 'CONTEXT_REMINDER_THRESHOLD', ThresholdSchema, DEFAULT_THRESHOLD_FRACTION),
    stateDir: getStateDir(env),
    remediationCommand: readSetting(env, 'CONTEXT_REMINDER_COMMAND', CommandSchema, DEFAULT_REMEDIATION_COMMAND),
  };
}
