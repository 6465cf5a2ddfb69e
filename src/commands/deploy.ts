import type { Config, DeployResult, Section } from '../types/config.types.js';
import type { EngineFactory } from '../types/deploy.types.js';
import { ConfigError, errorMessage } from '../services/errors.js';
import { createLogger, type Logger } from '../services/logger.js';
import { Runner } from '../services/runner.js';

export interface DeployCommandOptions {
  generate?: boolean;
  test?: boolean;
  sections?: string[];
  colors?: boolean;
  logger?: Logger;
  engineFactory?: EngineFactory;
}

/**
 * Applies command-line switches on top of the loaded configuration.
 */
export function applyOverrides(config: Config, options: DeployCommandOptions): Config {
  let sections = config.sections;

  if (options.sections && options.sections.length > 0) {
    const available = new Set(sections.map((section) => section.name));
    for (const name of options.sections) {
      if (!available.has(name)) {
        throw new ConfigError(`Section "${name}" not found. Available sections: ${[...available].join(', ')}`);
      }
    }
    const selected = new Set(options.sections);
    sections = sections.filter((section) => selected.has(section.name));
  }

  if (options.test) {
    sections = sections.map((section): Section => ({ ...section, testMode: true }));
  }
  if (options.generate) {
    sections = sections.map((section): Section => ({ ...section, mode: 'generate' }));
  }

  return {
    ...config,
    mode: options.generate ? 'generate' : config.mode,
    colors: options.colors ?? config.colors,
    sections,
  };
}

export async function deployCommand(loaded: Config, options: DeployCommandOptions = {}): Promise<DeployResult> {
  const startTime = new Date();
  const config = applyOverrides(loaded, options);
  const logger = options.logger ?? createLogger(config.logFile, config.colors);
  let completed = 0;

  try {
    const summary = await new Runner({
      logger,
      engineFactory: options.engineFactory,
      onSectionComplete: () => {
        completed += 1;
      },
    }).run(config);
    return {
      success: true,
      startTime: summary.startTime,
      endTime: summary.endTime,
      sectionsProcessed: summary.sections.length,
      errors: [],
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.log(`\nError: ${message}`, 'red');
    return {
      success: false,
      startTime,
      endTime: new Date(),
      sectionsProcessed: completed,
      errors: [message],
    };
  }
}
