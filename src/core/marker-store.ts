/**
 * Warned-marker storage.
 *
 * One small record per session holding the percentage at which the last
 * advisory was issued. The decision cycle only needs read / write / clear,
 * so the file-backed store can be swapped for anything with the same shape.
 */

import fs from 'fs';
import path from 'path';
import { ensureDir, getMarkerPath } from './paths.js';
import { isValidSessionKey } from './session.js';
import { logWarn } from './logger.js';

export interface MarkerStore {
  /** Last warned percentage, or 0 if the session was never warned */
  read(sessionKey: string): number;
  write(sessionKey: string, percent: number): void;
  /** Remove the marker; absent is not an error */
  clear(sessionKey: string): void;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function assertValidKey(sessionKey: string): void {
  if (!isValidSessionKey(sessionKey)) {
    throw new Error(`Invalid session key: ${sessionKey}`);
  }
}

/**
 * Parse marker content. Empty or non-integer content reads as 0.
 */
export function parseMarker(content: string): number {
  const trimmed = content.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return 0;
  }
  return parseInt(trimmed, 10);
}

/**
 * Write content via a temp file and rename, so readers never see a partial marker.
 */
function atomicWriteFileSync(filePath: string, content: string): void {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Marker files named `warned-<sessionKey>` in the state directory, each
 * containing the ASCII decimal percentage.
 */
export class FileMarkerStore implements MarkerStore {
  constructor(private readonly stateDir: string) {}

  read(sessionKey: string): number {
    assertValidKey(sessionKey);
    const markerPath = getMarkerPath(this.stateDir, sessionKey);

    try {
      return parseMarker(fs.readFileSync(markerPath, 'utf-8'));
    } catch (error) {
      if (!isNotFound(error)) {
        logWarn('Unreadable warned marker, treating as never warned', {
          markerPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return 0;
    }
  }

  write(sessionKey: string, percent: number): void {
    assertValidKey(sessionKey);
    ensureDir(this.stateDir);
    atomicWriteFileSync(getMarkerPath(this.stateDir, sessionKey), String(percent));
  }

  clear(sessionKey: string): void {
    assertValidKey(sessionKey);
    const markerPath = getMarkerPath(this.stateDir, sessionKey);

    try {
      fs.unlinkSync(markerPath);
    } catch (error) {
      if (!isNotFound(error)) {
        logWarn('Failed to clear warned marker', {
          markerPath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
