/**
 * Test utilities for the context reminder tests.
 *
 * Provides temp directory helpers and transcript builders.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

// ============================================================================
// Temp Directory Helpers
// ============================================================================

/**
 * Creates a temporary directory for testing.
 *
 * @example
 * ```ts
 * const tempDir = createTempDir();
 * try {
 *   // Use tempDir for testing
 * } finally {
 *   cleanupTempDir(tempDir);
 * }
 * ```
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'context-reminder-test-'));
}

/**
 * Cleans up a temporary directory by removing it and all contents.
 */
export function cleanupTempDir(dirPath: string): void {
  if (fs.existsSync(dirPath)) {
    fs.rmSync(dirPath, { recursive: true, force: true });
  }
}

// ============================================================================
// Transcript Builders
// ============================================================================

export interface TestUsage {
  input_tokens?: number;
  cache_read_input_tokens?: number;
  cache_creation_input_tokens?: number;
  output_tokens?: number;
}

/**
 * Assistant transcript line with usage nested under `message`.
 */
export function assistantLine(usage: TestUsage): string {
  return JSON.stringify({
    type: 'assistant',
    message: { role: 'assistant', content: 'ok', usage },
  });
}

/**
 * Transcript line with usage at the top level.
 */
export function topLevelUsageLine(usage: TestUsage): string {
  return JSON.stringify({ usage });
}

/**
 * Writes a JSONL transcript (one line per entry, trailing newline) and returns its path.
 */
export function writeTranscript(dir: string, lines: string[], name = 'transcript.jsonl'): string {
  const transcriptPath = path.join(dir, name);
  fs.writeFileSync(transcriptPath, lines.map(line => line + '\n').join(''), 'utf-8');
  return transcriptPath;
}

/**
 * Writes a single-entry transcript whose total context is `totalContext`
 * (split between input and cache reads) plus some output tokens.
 */
export function writeUsageTranscript(dir: string, totalContext: number, name?: string): string {
  const inputTokens = Math.floor(totalContext / 2);
  return writeTranscript(dir, [
    assistantLine({
      input_tokens: inputTokens,
      cache_read_input_tokens: totalContext - inputTokens,
      cache_creation_input_tokens: 0,
      output_tokens: 100,
    }),
  ], name);
}
