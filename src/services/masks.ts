import { minimatch } from 'minimatch';
import path from 'path';

export const BUILTIN_IGNORE_MASKS: readonly string[] = ['*.bak', '.svn', '.git*', 'Thumbs.db', '.DS_Store', '.idea'];

export const DEFAULT_PREPROCESS_MASKS: readonly string[] = ['*.js', '*.css'];

/**
 * Built-ins first, then the declared masks in their own order. Duplicates are kept.
 */
export function mergeIgnoreMasks(declared: string[]): string[] {
  return [...BUILTIN_IGNORE_MASKS, ...declared];
}

/**
 * Tests a relative path (`/dir/file.ext`) against a mask list.
 *
 * A mask without a slash matches the basename at any depth, a mask with a slash
 * is anchored at the root, a trailing slash restricts it to directories and a
 * leading `!` re-includes what earlier masks matched. The last matching mask wins.
 */
export function matchMask(relativePath: string, masks: readonly string[], isDir = false): boolean {
  const target = relativePath.replace(/^\/+/, '');
  const basename = path.posix.basename(target);
  let matched = false;

  for (const raw of masks) {
    let mask = raw.trim();
    if (!mask) continue;

    const negate = mask.startsWith('!');
    if (negate) mask = mask.slice(1);

    if (mask.endsWith('/')) {
      if (!isDir) continue;
      mask = mask.slice(0, -1);
    }

    const hit = mask.includes('/')
      ? minimatch(target, mask.replace(/^\/+/, ''), { dot: true })
      : minimatch(basename, mask, { dot: true });

    if (hit) matched = !negate;
  }

  return matched;
}
