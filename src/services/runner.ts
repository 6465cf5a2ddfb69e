import type { Config } from '../types/config.types.js';
import type { EngineFactory } from '../types/deploy.types.js';
import { createDeployer } from './assembler.js';
import { formatWarning } from './errors.js';
import { selectJob, type DeploymentJob } from './jobs.js';
import { createLogger, type Logger } from './logger.js';
import { countFiles } from './manifest.js';
import { acquireTempDir } from './temp-dir.js';

export interface RunnerOptions {
  logger?: Logger;
  clock?: () => Date;
  engineFactory?: EngineFactory;
  /** Called after each section that ran to completion. */
  onSectionComplete?: (section: string) => void;
}

export interface RunSummary {
  sections: string[];
  startTime: Date;
  endTime: Date;
  elapsedSeconds: number;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatStamp(date: Date): string {
  return `[${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}]`;
}

export function elapsedSeconds(start: Date, end: Date): number {
  return Math.floor(end.getTime() / 1000) - Math.floor(start.getTime() / 1000);
}

/**
 * Runs every configured section in order. The first failing section aborts
 * the run; sections already deployed stay deployed.
 */
export class Runner {
  constructor(private readonly options: RunnerOptions = {}) {}

  async run(config: Config): Promise<RunSummary> {
    const logger = this.options.logger ?? createLogger(config.logFile, config.colors);
    logger.useColors = config.colors;
    const now = this.options.clock ?? (() => new Date());

    const tempDir = await acquireTempDir(config.tempDir);
    if (!tempDir.existed) {
      logger.log(`Creating temporary directory ${tempDir.path}`);
    }
    if (tempDir.warning) {
      logger.log(formatWarning(tempDir.warning), 'red');
    }

    const startTime = now();
    logger.log(`Started at ${formatStamp(startTime)}`);

    const names = config.sections.map((section) => section.name);
    logger.log(`Found sections: ${names.length} (${names.join(',')})`);

    for (const section of config.sections) {
      logger.log(`\nDeploying section [${section.name}]`);

      const engine = createDeployer(config, section, logger, this.options.engineFactory);
      await this.execute(selectJob(section.mode ?? config.mode, engine), logger);
      this.options.onSectionComplete?.(section.name);
    }

    const endTime = now();
    const elapsed = elapsedSeconds(startTime, endTime);
    logger.log(`\nFinished at ${formatStamp(endTime)} (in ${elapsed} seconds)`, 'lime');

    return { sections: names, startTime, endTime, elapsedSeconds: elapsed };
  }

  private async execute(job: DeploymentJob, logger: Logger): Promise<void> {
    switch (job.mode) {
      case 'generate': {
        logger.log('Scanning files');
        const paths = await job.engine.collectPaths();
        const file = await job.engine.writeDeploymentFile(paths);
        logger.log(`Saved ${countFiles(paths)} files to ${file}`);
        return;
      }
      case 'deploy': {
        logger.log(job.engine.testMode ? 'Test mode' : 'Live mode');
        if (!job.engine.allowDelete) {
          logger.log('Deleting disabled');
        }
        await job.engine.deploy();
        return;
      }
    }
  }
}
