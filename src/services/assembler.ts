import type { Config, Section } from '../types/config.types.js';
import type { DeployerOptions, DeploymentEngine, EngineFactory } from '../types/deploy.types.js';
import type { Logger } from './logger.js';
import { Deployer } from './deployer.js';
import { buildFilters, resolvePreprocessMasks } from './filters.js';
import { createHookUnit } from './hooks.js';
import { mergeIgnoreMasks } from './masks.js';
import { createServer, parseRemote } from './server-factory.js';

export const defaultEngineFactory: EngineFactory = (options) => new Deployer(options);

/**
 * Turns one section into a ready-to-run deployment engine. Nothing is
 * connected or executed here.
 */
export function createDeployer(
  config: Config,
  section: Section,
  logger: Logger,
  engineFactory: EngineFactory = defaultEngineFactory
): DeploymentEngine {
  parseRemote(section.remote);

  const server = createServer(section);

  const options: DeployerOptions = {
    server,
    local: section.local,
    logger,
    tempDir: config.tempDir,
    ignoreMasks: mergeIgnoreMasks(section.ignoreMasks),
    preprocessMasks: [],
    filters: [],
    allowDelete: section.allowDelete,
    toPurge: [...section.purges],
    testMode: section.testMode,
    runBefore: [createHookUnit('before', section.beforeCallbacks, config, section)],
    runAfter: [createHookUnit('after', section.afterCallbacks, config, section)],
  };

  if (section.preprocess) {
    options.preprocessMasks = resolvePreprocessMasks(section);
    options.filters = buildFilters(section, logger);
  }

  if (section.deployFile !== '') {
    options.deploymentFile = section.deployFile;
  }

  return engineFactory(options);
}
