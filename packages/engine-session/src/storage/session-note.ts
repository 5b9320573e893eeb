import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from '../logger.js';

export const SESSION_NOTE_FILE = 'data.md';
export const SESSION_NOTE = 'Session data placeholder: nothing is carried over between sessions yet.\n';

/**
 * Best-effort write of the end-of-session note into `storageDir`.
 * Returns whether the note was written.
 */
export function writeSessionNote(storageDir: string | undefined, logger: Logger): boolean {
  if (!storageDir) {
    logger.debug('no storage_dir, session note skipped');
    return false;
  }

  const path = join(storageDir, SESSION_NOTE_FILE);
  try {
    writeFileSync(path, SESSION_NOTE, 'utf8');
  } catch (err) {
    logger.warn({ err, path }, 'could not write session note');
    return false;
  }
  logger.debug({ path }, 'session note written');
  return true;
}
