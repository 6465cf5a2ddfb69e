import type { HookRef } from './deploy.types.js';

export type RunMode = 'generate' | 'deploy';

// One named deployment target, as read from the configuration file
export interface Section {
  name: string;
  remote: string;
  local: string;
  mode?: RunMode;  // Overrides Config.mode for this section only
  passiveMode: boolean;
  filePermissions: number | null;
  dirPermissions: number | null;
  preprocess: boolean;
  preprocessMasks: string[];
  ignoreMasks: string[];
  deployFile: string;  // Empty means the engine default
  allowDelete: boolean;
  purges: string[];
  testMode: boolean;
  beforeCallbacks: HookRef[];
  afterCallbacks: HookRef[];
}

export interface Config {
  mode: RunMode;
  logFile: string | null;
  tempDir: string;
  colors: boolean;
  sections: Section[];
}

export interface LogEntry {
  timestamp: string;
  message: string;
  color?: LogColor;
}

export type LogColor = 'red' | 'lime' | 'green' | 'maroon' | 'yellow' | 'navy' | 'aqua' | 'gray';

export interface DeployResult {
  success: boolean;
  startTime: Date;
  endTime: Date;
  sectionsProcessed: number;
  errors: string[];
}
