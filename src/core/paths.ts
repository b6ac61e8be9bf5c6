import os from 'os';
import path from 'path';
import fs from 'fs';

/**
 * Ensure a directory exists, creating it if necessary
 */
export function ensureDir(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

/**
 * Get the state directory for warned markers and logs
 *
 * Precedence:
 * 1. CONTEXT_REMINDER_STATE_DIR env var
 * 2. ~/.cache/claude-hooks/ (default)
 *
 * Not created here; markers and logs create it on first write.
 */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.CONTEXT_REMINDER_STATE_DIR) {
    return env.CONTEXT_REMINDER_STATE_DIR;
  }
  return path.join(os.homedir(), '.cache', 'claude-hooks');
}

/**
 * Get log directory
 */
export function getLogDir(stateDir: string = getStateDir()): string {
  return ensureDir(path.join(stateDir, 'logs'));
}

/**
 * Get log file path for current date
 */
export function getLogFilePath(stateDir: string = getStateDir()): string {
  const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return path.join(getLogDir(stateDir), `${date}.log`);
}

/**
 * Get the warned-marker file for a session
 */
export function getMarkerPath(stateDir: string, sessionKey: string): string {
  return path.join(stateDir, `warned-${sessionKey}`);
}
