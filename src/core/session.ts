import crypto from 'crypto';

const SESSION_KEY_LENGTH = 12;

/**
 * Derive the session key from the transcript path.
 * Short MD5 prefix; only used to name the marker file, not for security.
 */
export function getSessionKey(transcriptPath: string): string {
  return crypto.createHash('md5').update(transcriptPath).digest('hex').substring(0, SESSION_KEY_LENGTH);
}

/**
 * Keys end up in file names, so only allow characters that cannot escape the state dir.
 */
export function isValidSessionKey(key: string): boolean {
  return /^[a-zA-Z0-9_-]+$/.test(key);
}
