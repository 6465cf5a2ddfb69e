import type { HookDirection } from '../types/deploy.types.js';

export class DeployError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends DeployError {}

export class TransferError extends DeployError {}

export interface HookResolutionWarning {
  kind: 'hook-resolution';
  direction: HookDirection;
  typeName: string;
  member: string;
  reason?: string;
}

export interface TempDirCreationWarning {
  kind: 'temp-dir-creation';
  path: string;
  reason: string;
}

export type DeployWarning = HookResolutionWarning | TempDirCreationWarning;

export function formatWarning(warning: DeployWarning): string {
  switch (warning.kind) {
    case 'hook-resolution': {
      const label = warning.direction === 'before' ? 'Before' : 'After';
      const hook = `${label} callback '${warning.typeName}::${warning.member}'`;
      return warning.reason ? `${hook} could not be loaded: ${warning.reason}` : `${hook} does not exist.`;
    }
    case 'temp-dir-creation':
      return `Unable to create temporary directory ${warning.path}: ${warning.reason}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
