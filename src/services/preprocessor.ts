import fs from 'fs-extra';
import path from 'path';
import { transform } from 'esbuild';
import type { Logger } from './logger.js';
import { errorMessage } from './errors.js';

const APACHE_INCLUDE = /<!--#include\s+file="([^"]+)"\s*-->/g;
const CSS_IMPORT = /@import\s+(?:url\(\s*)?["']?([^"')\s;]+)["']?\s*\)?\s*;/g;
const CSS_URL = /url\(\s*(["']?)([^"')]+)\1\s*\)/g;

function isExternal(reference: string): boolean {
  return /^([a-z][a-z0-9+.-]*:|\/\/|\/|#)/i.test(reference);
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Content filters for JS and CSS assets. Each filter takes the current content
 * and the local path of the file being processed.
 */
export class Preprocessor {
  constructor(private readonly logger: Logger) {}

  /** Inlines `<!--#include file="..." -->` directives, recursively. */
  expandApacheImports = async (content: string, origFile: string): Promise<string> => {
    return this.includeApache(content, origFile, new Set([path.resolve(origFile)]));
  };

  /** Inlines local `@import` rules and rebases `url()` references of the inlined sheets. */
  expandCssImports = async (content: string, origFile: string): Promise<string> => {
    return this.inlineCss(content, origFile, new Set([path.resolve(origFile)]));
  };

  compressJs = async (content: string, origFile: string): Promise<string> => {
    return this.compress(content, origFile, 'js');
  };

  compressCss = async (content: string, origFile: string): Promise<string> => {
    return this.compress(content, origFile, 'css');
  };

  /** `ancestors` holds the files currently being expanded; including one of them again is left as is. */
  private async includeApache(content: string, origFile: string, ancestors: ReadonlySet<string>): Promise<string> {
    const dir = path.dirname(origFile);
    let result = '';
    let last = 0;

    for (const match of content.matchAll(APACHE_INCLUDE)) {
      const includeFile = path.resolve(dir, match[1]);
      result += content.slice(last, match.index);
      last = (match.index ?? 0) + match[0].length;

      if (ancestors.has(includeFile)) {
        this.logger.log(`Recursive include of ${includeFile} skipped`, 'red');
        result += match[0];
        continue;
      }
      if (!(await fs.pathExists(includeFile))) {
        this.logger.log(`Include file ${includeFile} not found`, 'red');
        result += match[0];
        continue;
      }
      const included = await fs.readFile(includeFile, 'utf-8');
      result += await this.includeApache(included, includeFile, new Set([...ancestors, includeFile]));
    }

    return result + content.slice(last);
  }

  private async inlineCss(content: string, origFile: string, ancestors: ReadonlySet<string>): Promise<string> {
    const dir = path.dirname(origFile);
    let result = '';
    let last = 0;

    for (const match of content.matchAll(CSS_IMPORT)) {
      result += content.slice(last, match.index);
      last = (match.index ?? 0) + match[0].length;

      const reference = match[1];
      const importFile = path.resolve(dir, reference);
      if (isExternal(reference) || !(await fs.pathExists(importFile))) {
        result += match[0];
        continue;
      }
      if (ancestors.has(importFile)) {
        this.logger.log(`Recursive import of ${importFile} skipped`, 'red');
        result += match[0];
        continue;
      }

      const imported = await this.inlineCss(
        await fs.readFile(importFile, 'utf-8'),
        importFile,
        new Set([...ancestors, importFile])
      );
      const relative = toPosix(path.relative(dir, path.dirname(importFile)));
      result += relative === '' ? imported : imported.replace(CSS_URL, (whole, quote: string, url: string) => {
        return isExternal(url) || url.startsWith('data:') ? whole : `url(${quote}${relative}/${url}${quote})`;
      });
    }

    return result + content.slice(last);
  }

  private async compress(content: string, origFile: string, loader: 'js' | 'css'): Promise<string> {
    try {
      const output = await transform(content, { loader, minify: true, sourcefile: origFile });
      return output.code;
    } catch (err) {
      this.logger.log(`Unable to minify ${origFile}: ${errorMessage(err)}`, 'red');
      return content;
    }
  }
}
