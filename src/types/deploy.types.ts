import type { Config, Section } from './config.types.js';
import type { Logger } from '../services/logger.js';

export interface PermissionOptions {
  filePermissions: number | null;
  dirPermissions: number | null;
}

/**
 * Remote file system the engine deploys into. Paths are absolute remote
 * paths; `getDir()` gives the root the deployment targets.
 */
export interface Server {
  readonly filePermissions: number | null;
  readonly dirPermissions: number | null;
  connect(): Promise<void>;
  /** Resolves to `null` when the remote file does not exist. */
  readFile(remotePath: string): Promise<Buffer | null>;
  writeFile(remotePath: string, content: Buffer): Promise<void>;
  removeFile(remotePath: string): Promise<void>;
  renameFile(from: string, to: string): Promise<void>;
  createDir(remotePath: string): Promise<void>;
  removeDir(remotePath: string): Promise<void>;
  /** Removes everything inside the directory, keeping the directory itself. */
  purge(remotePath: string): Promise<void>;
  getDir(): string;
  close(): Promise<void>;
}

/** Relative path (leading `/`) -> md5 of the content, or `DIR_MARKER` for directories. */
export type LocalPaths = Map<string, string>;

export type FileTypeTag = 'js' | 'css';

export type FilterFunction = (content: string, origFile: string) => Promise<string>;

export interface FilterRegistration {
  tag: FileTypeTag;
  name: string;
  filter: FilterFunction;
  final: boolean;
}

// Narrow views of the engine, one per job variant
export interface ManifestEngine {
  collectPaths(): Promise<LocalPaths>;
  writeDeploymentFile(paths: LocalPaths): Promise<string>;
}

export interface SyncEngine {
  readonly testMode: boolean;
  readonly allowDelete: boolean;
  deploy(): Promise<void>;
}

export type DeploymentEngine = ManifestEngine & SyncEngine;

export interface HookContext {
  server: Server;
  logger: Logger;
  deployer: DeploymentEngine;
}

export type HookUnit = (context: HookContext) => Promise<void>;

export type HookCallback = (
  config: Config,
  section: Section,
  server: Server,
  logger: Logger,
  deployer: DeploymentEngine
) => void | Promise<void>;

export type HookRef =
  | { kind: 'function'; fn: HookCallback; name?: string }
  | { kind: 'member'; target: object; typeName: string; member: string; loadError?: string };

export type HookDirection = 'before' | 'after';

export interface DeployerOptions {
  server: Server;
  local: string;
  logger: Logger;
  tempDir: string;
  ignoreMasks: string[];
  preprocessMasks: string[];
  filters: FilterRegistration[];
  deploymentFile?: string;
  allowDelete: boolean;
  toPurge: string[];
  testMode: boolean;
  runBefore: HookUnit[];
  runAfter: HookUnit[];
}

export type EngineFactory = (options: DeployerOptions) => DeploymentEngine;
