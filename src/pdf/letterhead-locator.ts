import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { errorCode, hasErrorCode } from '../utils/fs-errors.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface LetterheadSearch {
  /** Explicit override; searched first */
  path?: string;
  assetDirs: readonly string[];
  fileNames: readonly string[];
  userDataDir?: string;
}

export function letterheadCandidates(search: LetterheadSearch): string[] {
  const candidates: string[] = [];
  if (search.path) candidates.push(resolve(search.path));
  for (const dir of search.assetDirs) {
    for (const name of search.fileNames) candidates.push(resolve(join(dir, name)));
  }
  if (search.userDataDir) {
    for (const name of search.fileNames) candidates.push(resolve(join(search.userDataDir, name)));
  }
  return [...new Set(candidates)];
}

async function isReadableFile(path: string, logger: Logger): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return (await stat(path)).isFile();
  } catch (error) {
    // Any failure rules the candidate out; only the unexpected ones are logged
    if (!hasErrorCode(error, 'ENOENT', 'ENOTDIR', 'EACCES', 'EPERM')) {
      logger.warn('Skipping unusable letterhead candidate', { path, code: errorCode(error), error });
    }
    return false;
  }
}

/**
 * First candidate that is a regular, readable file, or null when none is.
 */
export async function locateLetterhead(
  candidates: readonly string[],
  logger: Logger = silentLogger
): Promise<string | null> {
  for (const candidate of candidates) {
    if (await isReadableFile(candidate, logger)) return candidate;
  }
  return null;
}
