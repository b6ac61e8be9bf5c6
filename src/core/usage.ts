/**
 * Token usage snapshot and percentage math.
 */

import { z } from 'zod';

/**
 * Most recent cumulative token usage of a session.
 *
 * totalContext counts what is sent to the model (input plus cache reads and
 * writes). Output tokens are kept for reference but excluded.
 */
export interface UsageSnapshot {
  inputTokens: number;
  cacheReadInputTokens: number;
  cacheCreationInputTokens: number;
  outputTokens: number;
  totalContext: number;
}

// Absent, negative or non-integer counters read as 0
const TokenCount = z.number().int().nonnegative().catch(0);

export const UsageRecordSchema = z.object({
  input_tokens: TokenCount,
  cache_read_input_tokens: TokenCount,
  cache_creation_input_tokens: TokenCount,
  output_tokens: TokenCount,
});

export type UsageRecord = z.infer<typeof UsageRecordSchema>;

export function emptyUsage(): UsageSnapshot {
  return {
    inputTokens: 0,
    cacheReadInputTokens: 0,
    cacheCreationInputTokens: 0,
    outputTokens: 0,
    totalContext: 0,
  };
}

/**
 * Build a snapshot from a raw `usage` object of a transcript record.
 */
export function toUsageSnapshot(usage: Record<string, unknown>): UsageSnapshot {
  const record = UsageRecordSchema.parse(usage);
  return {
    inputTokens: record.input_tokens,
    cacheReadInputTokens: record.cache_read_input_tokens,
    cacheCreationInputTokens: record.cache_creation_input_tokens,
    outputTokens: record.output_tokens,
    totalContext: record.input_tokens + record.cache_read_input_tokens + record.cache_creation_input_tokens,
  };
}

/**
 * Whole percentage of the ceiling used, rounded down. Can exceed 100.
 *
 * Integer math keeps 57000 / 100000 at 57 where float division would give 56.
 */
export function computePercent(snapshot: UsageSnapshot, ceiling: number): number {
  return Math.floor((snapshot.totalContext * 100) / ceiling);
}

/**
 * Whole-number threshold for a fraction (0.95 -> 95), truncating.
 */
export function toThresholdPercent(fraction: number): number {
  // Round off float noise first so 0.29 gives 29, not 28
  return Math.trunc(Number((fraction * 100).toFixed(6)));
}
