import fs from 'fs';
import { emptyUsage, toUsageSnapshot, type UsageSnapshot } from './usage.js';
import { logError } from './logger.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the usage object out of one parsed transcript line, if any.
 * A top-level `usage` takes precedence over `message.usage`.
 */
export function findUsage(line: unknown): Record<string, unknown> | null {
  if (!isRecord(line)) {
    return null;
  }

  const { usage, message } = line;
  if (isRecord(usage)) {
    return usage;
  }
  if (isRecord(message)) {
    const nested = message.usage;
    if (isRecord(nested)) {
      return nested;
    }
  }
  return null;
}

/**
 * Extract the latest token usage from a JSONL transcript.
 *
 * The last usage-bearing line wins, even when an earlier one was larger.
 * Lines that are not valid JSON are skipped. A missing or unreadable file
 * yields an empty snapshot.
 */
export function extractUsage(transcriptPath: string): UsageSnapshot {
  let content: string;
  try {
    content = fs.readFileSync(transcriptPath, 'utf-8');
  } catch (error) {
    logError('Error reading transcript', error, { transcriptPath });
    return emptyUsage();
  }

  let lastUsage: Record<string, unknown> | null = null;
  for (const line of content.split('\n')) {
    // Cheap pre-filter; most transcript lines carry no usage at all
    if (!line.includes('"usage"')) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      continue;
    }

    const usage = findUsage(parsed);
    if (usage) {
      lastUsage = usage;
    }
  }

  return lastUsage ? toUsageSnapshot(lastUsage) : emptyUsage();
}
