import fs from 'fs-extra';
import path from 'path';
import { createHash } from 'crypto';
import type {
  DeployerOptions,
  DeploymentEngine,
  FilterRegistration,
  HookUnit,
  LocalPaths,
  Server,
} from '../types/deploy.types.js';
import type { Logger } from './logger.js';
import { DeployError, errorMessage } from './errors.js';
import { fileTypeTag, filtersFor } from './filters.js';
import { DEFAULT_DEPLOYMENT_FILE, DIR_MARKER, decodeManifest, encodeManifest, isDirPath } from './manifest.js';
import { matchMask } from './masks.js';
import { joinRemote } from './servers/paths.js';

const TEMP_SUFFIX = '.deploytmp';

function md5(content: Buffer | string): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * Synchronizes a local directory with a remote server. The remote keeps a
 * manifest of deployed paths and hashes, so only changed files are uploaded.
 */
export class Deployer implements DeploymentEngine {
  readonly server: Server;
  readonly local: string;
  readonly logger: Logger;
  readonly tempDir: string;
  readonly ignoreMasks: string[];
  readonly preprocessMasks: string[];
  readonly filters: FilterRegistration[];
  readonly deploymentFile: string;
  readonly allowDelete: boolean;
  readonly toPurge: string[];
  readonly testMode: boolean;
  readonly runBefore: HookUnit[];
  readonly runAfter: HookUnit[];

  constructor(options: DeployerOptions) {
    this.server = options.server;
    this.local = path.resolve(options.local);
    this.logger = options.logger;
    this.tempDir = options.tempDir;
    this.ignoreMasks = options.ignoreMasks;
    this.preprocessMasks = options.preprocessMasks;
    this.filters = options.filters;
    this.deploymentFile = options.deploymentFile ?? DEFAULT_DEPLOYMENT_FILE;
    this.allowDelete = options.allowDelete;
    this.toPurge = options.toPurge;
    this.testMode = options.testMode;
    this.runBefore = options.runBefore;
    this.runAfter = options.runAfter;
  }

  async deploy(): Promise<void> {
    this.logger.log('Connecting to server');

    try {
      await this.server.connect();
      await this.runJobs(this.runBefore);
      await this.synchronize();
      await this.runJobs(this.runAfter);
    } finally {
      await this.server.close();
    }
  }

  /**
   * Walks the local root. Directories are keyed with a trailing slash, files
   * map to the md5 of their content. Ignored directories are not descended.
   */
  async collectPaths(): Promise<LocalPaths> {
    if (!(await fs.pathExists(this.local))) {
      throw new DeployError(`Local directory ${this.local} not found`);
    }

    const paths: LocalPaths = new Map();
    const masks = [...this.ignoreMasks, `/${this.deploymentFile}`, `/${this.deploymentFile}.running`];

    const walk = async (relativeDir: string): Promise<void> => {
      const entries = await fs.readdir(path.join(this.local, relativeDir), { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const relativePath = `${relativeDir}/${entry.name}`;
        const isDir = entry.isDirectory();
        if (matchMask(relativePath, masks, isDir)) continue;

        if (isDir) {
          paths.set(`${relativePath}/`, DIR_MARKER);
          await walk(relativePath);
        } else if (entry.isFile()) {
          paths.set(relativePath, md5(await fs.readFile(path.join(this.local, relativePath))));
        }
      }
    };

    await walk('');
    return paths;
  }

  async writeDeploymentFile(paths: LocalPaths): Promise<string> {
    const file = path.join(this.local, this.deploymentFile);
    await fs.writeFile(file, encodeManifest(paths));
    return file;
  }

  private async synchronize(): Promise<void> {
    const root = this.server.getDir();
    const remotePaths = await this.loadDeploymentFile();

    this.logger.log('Scanning files');
    const localPaths = await this.collectPaths();

    const toUpload = [...localPaths].filter(([p, hash]) => remotePaths?.get(p) !== hash).map(([p]) => p);
    const toDelete = this.allowDelete && remotePaths
      ? [...remotePaths.keys()].filter((p) => !localPaths.has(p)).reverse()
      : [];

    if (toUpload.length === 0 && toDelete.length === 0 && this.toPurge.length === 0) {
      this.logger.log('Already synchronized.', 'lime');
      return;
    }

    if (this.testMode) {
      this.report(toUpload, toDelete);
      return;
    }

    const runningFile = joinRemote(root, `${this.deploymentFile}.running`);
    this.logger.log(`Creating remote file ${this.deploymentFile}.running`);
    await this.server.writeFile(runningFile, Buffer.from(new Date().toISOString()));

    const uploaded = await this.uploadPaths(root, toUpload);
    await this.renamePaths(root, uploaded);
    await this.removePaths(root, toDelete);
    await this.purgePaths(root);

    const manifestFile = joinRemote(root, this.deploymentFile);
    await this.server.writeFile(manifestFile + TEMP_SUFFIX, encodeManifest(localPaths));
    await this.server.renameFile(manifestFile + TEMP_SUFFIX, manifestFile);

    this.logger.log(`Deleting remote file ${this.deploymentFile}.running`);
    await this.server.removeFile(runningFile);
  }

  private report(toUpload: string[], toDelete: string[]): void {
    this.logger.log(`Files to upload: ${toUpload.length}`, 'green');
    for (const p of toUpload) this.logger.log(`  ${p}`);

    this.logger.log(`Files to delete: ${toDelete.length}`, 'maroon');
    for (const p of toDelete) this.logger.log(`  ${p}`);

    for (const p of this.toPurge) this.logger.log(`Would purge ${p}`, 'maroon');
  }

  private async loadDeploymentFile(): Promise<LocalPaths | null> {
    const content = await this.server.readFile(joinRemote(this.server.getDir(), this.deploymentFile));
    if (content === null) {
      this.logger.log('Remote deployment file not found, uploading everything', 'yellow');
      return null;
    }

    try {
      return decodeManifest(content);
    } catch (err) {
      this.logger.log(`Unable to read remote ${this.deploymentFile}: ${errorMessage(err)}`, 'red');
      return null;
    }
  }

  /** Returns the files that went up as temporary copies. */
  private async uploadPaths(root: string, toUpload: string[]): Promise<string[]> {
    const files: string[] = [];

    for (const [index, relativePath] of toUpload.entries()) {
      const progress = `(${index + 1} of ${toUpload.length})`;

      if (isDirPath(relativePath)) {
        this.logger.log(`Creating directory ${relativePath} ${progress}`);
        await this.server.createDir(joinRemote(root, relativePath.slice(0, -1)));
        continue;
      }

      this.logger.log(`Uploading ${relativePath} ${progress}`);
      const content = await this.readLocal(relativePath);
      await this.server.writeFile(joinRemote(root, relativePath) + TEMP_SUFFIX, content);
      files.push(relativePath);
    }

    return files;
  }

  private async renamePaths(root: string, files: string[]): Promise<void> {
    if (files.length === 0) return;

    this.logger.log('Renaming uploaded files');
    for (const relativePath of files) {
      const target = joinRemote(root, relativePath);
      await this.server.renameFile(target + TEMP_SUFFIX, target);
    }
  }

  private async removePaths(root: string, toDelete: string[]): Promise<void> {
    for (const relativePath of toDelete) {
      this.logger.log(`Deleting ${relativePath}`, 'maroon');
      if (isDirPath(relativePath)) {
        await this.server.removeDir(joinRemote(root, relativePath.slice(0, -1)));
      } else {
        await this.server.removeFile(joinRemote(root, relativePath));
      }
    }
  }

  private async purgePaths(root: string): Promise<void> {
    for (const relativePath of this.toPurge) {
      this.logger.log(`Purging ${relativePath}`, 'maroon');
      await this.server.purge(joinRemote(root, relativePath));
    }
  }

  private async runJobs(jobs: HookUnit[]): Promise<void> {
    for (const job of jobs) {
      await job({ server: this.server, logger: this.logger, deployer: this });
    }
  }

  /**
   * Local content as it should be uploaded: files matching the preprocess
   * masks go through the filter chain of their type, cached in the temp dir.
   */
  private async readLocal(relativePath: string): Promise<Buffer> {
    const file = path.join(this.local, relativePath);
    const content = await fs.readFile(file);
    const tag = fileTypeTag(relativePath);

    if (tag === null || this.filters.length === 0 || !matchMask(relativePath, this.preprocessMasks)) {
      return content;
    }

    const chain = filtersFor(tag, this.filters);
    const cacheFile = path.join(this.tempDir, md5(`${relativePath}:${md5(content)}:${chain.map((f) => f.name).join(',')}`));
    const cacheable = await fs.pathExists(this.tempDir);

    if (cacheable && (await fs.pathExists(cacheFile))) {
      return fs.readFile(cacheFile);
    }

    let text = content.toString('utf-8');
    for (const registration of chain) {
      text = await registration.filter(text, file);
    }

    const filtered = Buffer.from(text, 'utf-8');
    if (cacheable) {
      await fs.writeFile(cacheFile, filtered);
    }
    return filtered;
  }
}
