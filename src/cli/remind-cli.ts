#!/usr/bin/env node
/**
 * Context reminder CLI - PostToolUse hook entry point.
 *
 * Reads the hook payload from stdin, prints an advisory JSON line when the
 * context window crosses the threshold, and always exits 0 so the session
 * is never blocked.
 */

import { loadConfig } from '../core/config.js';
import { logError } from '../core/logger.js';
import { handleHookInput } from '../hooks/context-reminder.js';

/**
 * Read stdin as a string.
 */
function readStdin(): Promise<string> {
  return new Promise((resolve) => {
    let data = '';
    // Decode as a stream so multi-byte characters split across chunks stay intact
    process.stdin.setEncoding('utf8');
    process.stdin.on('data', (chunk) => data += chunk);
    process.stdin.on('end', () => resolve(data));
  });
}

async function main(): Promise<void> {
  try {
    const stdinData = await readStdin();
    const output = handleHookInput(stdinData, loadConfig());
    if (output) {
      console.log(output);
    }
  } catch (error) {
    // Fail open: a broken reminder must not disrupt the session
    logError('Error in context reminder', error);
  } finally {
    process.exitCode = 0;
  }
}

void main();
