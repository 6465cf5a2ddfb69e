import type { Server } from '../types/deploy.types.js';

const DESTRUCTIVE = /^(removeFile|removeDir|purge) /;

/**
 * In-process Server that records every call. Paths are kept as given.
 */
export class MemoryServer implements Server {
  readonly files = new Map<string, Buffer>();
  readonly dirs = new Set<string>();
  readonly calls: string[] = [];

  constructor(
    private readonly root = '/www',
    readonly filePermissions: number | null = null,
    readonly dirPermissions: number | null = null
  ) {}

  async connect(): Promise<void> {
    this.calls.push('connect');
  }

  async readFile(remotePath: string): Promise<Buffer | null> {
    this.calls.push(`readFile ${remotePath}`);
    return this.files.get(remotePath) ?? null;
  }

  async writeFile(remotePath: string, content: Buffer): Promise<void> {
    this.calls.push(`writeFile ${remotePath}`);
    this.files.set(remotePath, content);
  }

  async removeFile(remotePath: string): Promise<void> {
    this.calls.push(`removeFile ${remotePath}`);
    this.files.delete(remotePath);
  }

  async renameFile(from: string, to: string): Promise<void> {
    this.calls.push(`renameFile ${from} ${to}`);
    const content = this.files.get(from);
    if (content === undefined) {
      throw new Error(`No such file ${from}`);
    }
    this.files.delete(from);
    this.files.set(to, content);
  }

  async createDir(remotePath: string): Promise<void> {
    this.calls.push(`createDir ${remotePath}`);
    this.dirs.add(remotePath);
  }

  async removeDir(remotePath: string): Promise<void> {
    this.calls.push(`removeDir ${remotePath}`);
    this.dirs.delete(remotePath);
  }

  async purge(remotePath: string): Promise<void> {
    this.calls.push(`purge ${remotePath}`);
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${remotePath}/`)) this.files.delete(file);
    }
  }

  getDir(): string {
    return this.root;
  }

  async close(): Promise<void> {
    this.calls.push('close');
  }

  destructiveCalls(): string[] {
    return this.calls.filter((call) => DESTRUCTIVE.test(call));
  }

  writes(): string[] {
    return this.calls.filter((call) => call.startsWith('writeFile '));
  }
}
