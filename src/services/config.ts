import fs from 'fs-extra';
import yaml from 'js-yaml';
import path from 'path';
import { pathToFileURL } from 'url';
import type { Config, RunMode, Section } from '../types/config.types.js';
import type { HookRef } from '../types/deploy.types.js';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_FILENAME = 'deploy.config.yaml';
export const DEFAULT_TEMP_DIR = '.deploy-temp';

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: RawObject, key: string, where: string, fallback?: string): string {
  const value = raw[key];
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback;
    throw new ConfigError(`Missing "${key}" in ${where}`);
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`"${key}" in ${where} must be a string`);
  }
  return value;
}

function readBoolean(raw: RawObject, key: string, where: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`"${key}" in ${where} must be true or false`);
  }
  return value;
}

function readStringList(raw: RawObject, key: string, where: string): string[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`"${key}" in ${where} must be a list of strings`);
  }
  return value;
}

function readMode(value: unknown, where: string): RunMode {
  if (value === 'generate' || value === 'deploy') return value;
  throw new ConfigError(`"mode" in ${where} must be "generate" or "deploy"`);
}

/**
 * Modes are octal whether quoted ("0644") or not: YAML reads an unquoted 0644
 * as the decimal number 644, whose digits are taken as octal again.
 */
function readPermissions(raw: RawObject, key: string, where: string): number | null {
  const value = raw[key];
  if (value === undefined || value === null) return null;
  const digits = typeof value === 'number' && Number.isInteger(value) ? String(value) : value;
  if (typeof digits === 'string' && /^0?[0-7]{3,4}$/.test(digits)) return parseInt(digits, 8);
  throw new ConfigError(`"${key}" in ${where} must be a permission mode such as "0644"`);
}

interface HookTarget {
  target: object;
  loadError?: string;
}

async function importHookTarget(specifier: string, baseDir: string): Promise<HookTarget> {
  const isRelative = specifier.startsWith('.') || path.isAbsolute(specifier);
  const url = isRelative ? pathToFileURL(path.resolve(baseDir, specifier)).href : specifier;

  try {
    const namespace: unknown = await import(url);
    return { target: typeof namespace === 'object' && namespace !== null ? namespace : {} };
  } catch (err) {
    // Reported as an unresolvable hook when the section runs
    return { target: {}, loadError: errorMessage(err) };
  }
}

/**
 * Reads a `module#export` hook reference. The module is imported relative to
 * the configuration file; `#export` defaults to `default`.
 */
export async function resolveHookSpec(spec: string, baseDir: string): Promise<HookRef> {
  const separator = spec.lastIndexOf('#');
  const specifier = separator === -1 ? spec : spec.slice(0, separator);
  const member = separator === -1 ? 'default' : spec.slice(separator + 1);

  const { target, loadError } = await importHookTarget(specifier, baseDir);
  return {
    kind: 'member',
    target,
    typeName: specifier,
    member,
    ...(loadError === undefined ? {} : { loadError }),
  };
}

async function parseSection(name: string, raw: unknown, baseDir: string): Promise<Section> {
  const where = `section "${name}"`;
  if (!isRecord(raw)) {
    throw new ConfigError(`Section "${name}" must be a mapping`);
  }

  const beforeCallbacks = await Promise.all(
    readStringList(raw, 'beforeCallbacks', where).map((spec) => resolveHookSpec(spec, baseDir))
  );
  const afterCallbacks = await Promise.all(
    readStringList(raw, 'afterCallbacks', where).map((spec) => resolveHookSpec(spec, baseDir))
  );

  return {
    name,
    remote: readString(raw, 'remote', where, ''),
    local: path.resolve(baseDir, readString(raw, 'local', where)),
    mode: raw.mode === undefined || raw.mode === null ? undefined : readMode(raw.mode, where),
    passiveMode: readBoolean(raw, 'passiveMode', where, true),
    filePermissions: readPermissions(raw, 'filePermissions', where),
    dirPermissions: readPermissions(raw, 'dirPermissions', where),
    preprocess: readBoolean(raw, 'preprocess', where, false),
    preprocessMasks: readStringList(raw, 'preprocessMasks', where),
    ignoreMasks: readStringList(raw, 'ignoreMasks', where),
    deployFile: readString(raw, 'deployFile', where, ''),
    allowDelete: readBoolean(raw, 'allowDelete', where, true),
    purges: readStringList(raw, 'purges', where),
    testMode: readBoolean(raw, 'testMode', where, false),
    beforeCallbacks,
    afterCallbacks,
  };
}

/**
 * Builds a Config from parsed YAML. Relative paths resolve against `baseDir`.
 * The remote URL is only checked when the section is assembled.
 */
export async function parseConfig(raw: unknown, baseDir: string): Promise<Config> {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a mapping');
  }
  if (!isRecord(raw.sections) || Object.keys(raw.sections).length === 0) {
    throw new ConfigError('Missing "sections" in configuration. At least one section is required.');
  }

  const sections: Section[] = [];
  for (const [name, sectionRaw] of Object.entries(raw.sections)) {
    sections.push(await parseSection(name, sectionRaw, baseDir));
  }

  const logFile = readString(raw, 'logFile', 'configuration', '');

  return {
    mode: raw.mode === undefined || raw.mode === null ? 'deploy' : readMode(raw.mode, 'configuration'),
    logFile: logFile === '' ? null : path.resolve(baseDir, logFile),
    tempDir: path.resolve(baseDir, readString(raw, 'tempDir', 'configuration', DEFAULT_TEMP_DIR)),
    colors: readBoolean(raw, 'colors', 'configuration', true),
    sections,
  };
}

export class ConfigService {
  private config: Config | null = null;
  private configPath: string | null = null;

  async load(configPath?: string): Promise<Config> {
    const filePath = configPath ? path.resolve(configPath) : this.findConfigFile();

    if (!filePath) {
      throw new ConfigError(`Configuration file not found. Create '${CONFIG_FILENAME}' in the current directory.`);
    }
    if (!(await fs.pathExists(filePath))) {
      throw new ConfigError(`Configuration file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = yaml.load(await fs.readFile(filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Unable to parse ${filePath}: ${errorMessage(err)}`, { cause: err });
    }

    this.config = await parseConfig(raw, path.dirname(filePath));
    this.configPath = filePath;
    return this.config;
  }

  getConfig(): Config {
    if (!this.config) {
      throw new ConfigError('Configuration not loaded. Call load() first.');
    }
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  private findConfigFile(): string | null {
    const configPath = path.join(process.cwd(), CONFIG_FILENAME);
    return fs.existsSync(configPath) ? configPath : null;
  }
}

export const configService = new ConfigService();
