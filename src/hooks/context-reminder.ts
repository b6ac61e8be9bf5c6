/**
 * PostToolUse Hook - warn when the context window is nearly full.
 *
 * Runs after every tool call and:
 * 1. Reads the latest token usage from the session transcript
 * 2. Computes the percentage of the context ceiling in use
 * 3. Clears the session's warned marker if usage dropped below threshold
 * 4. Emits an advisory on first crossing and at every further 1% increase
 *
 * Fails open: malformed input or a missing transcript produce no output.
 */

import fs from 'fs';
import { z } from 'zod';
import type { ReminderConfig } from '../core/config.js';
import { FileMarkerStore, type MarkerStore } from '../core/marker-store.js';
import { getSessionKey } from '../core/session.js';
import { extractUsage } from '../core/transcript.js';
import { computePercent, toThresholdPercent } from '../core/usage.js';
import { logDebug } from '../core/logger.js';

/**
 * PostToolUse hook input from Claude Code. Only transcript_path is read;
 * session_id, tool_name, tool_response etc. pass through unvalidated.
 */
export const HookInputSchema = z
  .object({
    transcript_path: z.string().min(1),
  })
  .passthrough();

/**
 * Hook reply printed on stdout. `continue: true` never blocks the session.
 */
export interface Advisory {
  continue: true;
  systemMessage: string;
}

/**
 * True when usage is at or above threshold and higher than the last warned
 * percentage (0 when the session was never warned).
 */
export function shouldWarn(
  store: MarkerStore,
  sessionKey: string,
  currentPercent: number,
  thresholdPercent: number
): boolean {
  if (currentPercent < thresholdPercent) {
    return false;
  }
  return currentPercent > store.read(sessionKey);
}

export function markWarned(store: MarkerStore, sessionKey: string, percent: number): void {
  store.write(sessionKey, percent);
}

/**
 * Clear the warned marker once usage falls below threshold (compaction or a
 * fresh session), so the next crossing warns again.
 */
export function resetIfBelow(
  store: MarkerStore,
  sessionKey: string,
  currentPercent: number,
  thresholdPercent: number
): void {
  if (currentPercent < thresholdPercent) {
    store.clear(sessionKey);
  }
}

export function formatAdvisory(percent: number, remediationCommand: string): Advisory {
  return {
    continue: true,
    systemMessage: `⚠️ Context ${percent}% full - consider ${remediationCommand}`,
  };
}

/**
 * One decision cycle for a transcript.
 *
 * @returns The advisory to emit, or null when nothing should be printed
 */
export function runContextReminder(
  transcriptPath: string,
  config: ReminderConfig,
  store: MarkerStore = new FileMarkerStore(config.stateDir)
): Advisory | null {
  if (!fs.existsSync(transcriptPath)) {
    return null;
  }

  const sessionKey = getSessionKey(transcriptPath);
  const usage = extractUsage(transcriptPath);
  const currentPercent = computePercent(usage, config.maxContextTokens);
  const thresholdPercent = toThresholdPercent(config.thresholdFraction);

  logDebug('Context usage', {
    sessionKey,
    totalContext: usage.totalContext,
    currentPercent,
    thresholdPercent,
  });

  // Must run before the warn check so a reset and a re-warn can happen in one call
  resetIfBelow(store, sessionKey, currentPercent, thresholdPercent);

  if (!shouldWarn(store, sessionKey, currentPercent, thresholdPercent)) {
    return null;
  }

  markWarned(store, sessionKey, currentPercent);
  logDebug('Context usage advisory issued', { sessionKey, currentPercent, thresholdPercent });
  return formatAdvisory(currentPercent, config.remediationCommand);
}

/**
 * Handle the raw stdin payload of a PostToolUse hook.
 *
 * @returns The JSON line to print, or null for no output
 */
export function handleHookInput(raw: string, config: ReminderConfig): string | null {
  if (!raw.trim()) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    logDebug('Ignoring hook input that is not JSON');
    return null;
  }

  const input = HookInputSchema.safeParse(payload);
  if (!input.success) {
    logDebug('Ignoring hook input without transcript_path');
    return null;
  }

  const advisory = runContextReminder(input.data.transcript_path, config);
  return advisory ? JSON.stringify(advisory) : null;
}
