import fs from 'fs-extra';
import type { TempDirCreationWarning } from './errors.js';
import { errorMessage } from './errors.js';

export interface TempDirAcquisition {
  path: string;
  existed: boolean;
  warning: TempDirCreationWarning | null;
}

/**
 * Creates the temp dir when it is missing. A failed creation comes back as a
 * warning, the directory is only used as a filter cache.
 */
export async function acquireTempDir(dir: string): Promise<TempDirAcquisition> {
  if (await fs.pathExists(dir)) {
    return { path: dir, existed: true, warning: null };
  }

  try {
    await fs.ensureDir(dir);
    return { path: dir, existed: false, warning: null };
  } catch (err) {
    return {
      path: dir,
      existed: false,
      warning: { kind: 'temp-dir-creation', path: dir, reason: errorMessage(err) },
    };
  }
}
