import { deflateRawSync, inflateRawSync } from 'zlib';
import type { LocalPaths } from '../types/deploy.types.js';

export const DEFAULT_DEPLOYMENT_FILE = '.htdeployment';

// Value stored for directories; file values are md5 hex digests
export const DIR_MARKER = '1';

export function isDirPath(relativePath: string): boolean {
  return relativePath.endsWith('/');
}

export function countFiles(paths: LocalPaths): number {
  let count = 0;
  for (const key of paths.keys()) {
    if (!isDirPath(key)) count++;
  }
  return count;
}

/** `<hash>=<path>` lines, raw-deflated. */
export function encodeManifest(paths: LocalPaths): Buffer {
  let text = '';
  for (const [relativePath, hash] of paths) {
    text += `${hash}=${relativePath}\n`;
  }
  return deflateRawSync(Buffer.from(text, 'utf-8'), { level: 9 });
}

export function decodeManifest(content: Buffer): LocalPaths {
  const paths: LocalPaths = new Map();
  const text = inflateRawSync(content).toString('utf-8');

  for (const line of text.split('\n')) {
    const separator = line.indexOf('=');
    if (separator <= 0) continue;
    paths.set(line.slice(separator + 1), line.slice(0, separator));
  }

  return paths;
}
