import type { RunMode } from '../types/config.types.js';
import type { DeploymentEngine, ManifestEngine, SyncEngine } from '../types/deploy.types.js';

export interface GenerateJob {
  readonly mode: 'generate';
  readonly engine: ManifestEngine;
}

export interface SyncJob {
  readonly mode: 'deploy';
  readonly engine: SyncEngine;
}

export type DeploymentJob = GenerateJob | SyncJob;

export function selectJob(mode: RunMode, engine: DeploymentEngine): DeploymentJob {
  if (mode === 'generate') {
    return { mode: 'generate', engine };
  }
  return { mode: 'deploy', engine };
}
