import type { Section } from '../types/config.types.js';
import type { FileTypeTag, FilterRegistration } from '../types/deploy.types.js';
import type { Logger } from './logger.js';
import { DEFAULT_PREPROCESS_MASKS } from './masks.js';
import { Preprocessor } from './preprocessor.js';

export function resolvePreprocessMasks(section: Section): string[] {
  return section.preprocessMasks.length === 0 ? [...DEFAULT_PREPROCESS_MASKS] : [...section.preprocessMasks];
}

export function buildFilters(section: Section, logger: Logger): FilterRegistration[] {
  if (!section.preprocess) {
    return [];
  }

  const preprocessor = new Preprocessor(logger);
  return [
    { tag: 'js', name: 'expandApacheImports', filter: preprocessor.expandApacheImports, final: false },
    { tag: 'js', name: 'compressJs', filter: preprocessor.compressJs, final: true },
    { tag: 'css', name: 'expandApacheImports', filter: preprocessor.expandApacheImports, final: false },
    { tag: 'css', name: 'expandCssImports', filter: preprocessor.expandCssImports, final: false },
    { tag: 'css', name: 'compressCss', filter: preprocessor.compressCss, final: true },
  ];
}

/**
 * Filters registered for a tag, in registration order, cut after the first final one.
 */
export function filtersFor(tag: FileTypeTag, filters: FilterRegistration[]): FilterRegistration[] {
  const chain: FilterRegistration[] = [];
  for (const registration of filters) {
    if (registration.tag !== tag) continue;
    chain.push(registration);
    if (registration.final) break;
  }
  return chain;
}

export function fileTypeTag(file: string): FileTypeTag | null {
  const match = /\.(js|css)$/i.exec(file);
  if (!match) return null;
  return match[1].toLowerCase() === 'js' ? 'js' : 'css';
}
