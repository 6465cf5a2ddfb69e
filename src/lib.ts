export { Runner, type RunnerOptions, type RunSummary } from './services/runner.js';
export { createDeployer, defaultEngineFactory } from './services/assembler.js';
export { createServer, parseRemote } from './services/server-factory.js';
export { buildFilters, resolvePreprocessMasks } from './services/filters.js';
export { createHookUnit } from './services/hooks.js';
export { selectJob, type DeploymentJob, type GenerateJob, type SyncJob } from './services/jobs.js';
export { Deployer } from './services/deployer.js';
export { Preprocessor } from './services/preprocessor.js';
export { SshServer } from './services/servers/ssh.js';
export { FtpServer } from './services/servers/ftp.js';
export { ConfigService, parseConfig } from './services/config.js';
export { Logger, ConsoleLogger, FileLogger, createLogger } from './services/logger.js';
export { DeployError, ConfigError, TransferError } from './services/errors.js';
export { deployCommand } from './commands/deploy.js';
export type * from './types/config.types.js';
export type * from './types/deploy.types.js';
