#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { configService } from './services/config.js';
import { deployCommand } from './commands/deploy.js';
import { errorMessage } from './services/errors.js';

interface CliOptions {
  generate?: boolean;
  test?: boolean;
  section?: string[];
  colors: boolean;
}

async function main() {
  const program = new Command();

  program
    .name('section-deploy')
    .description('Deploys local directories to FTP and SFTP servers, one configured section at a time')
    .version('1.0.0')
    .argument('[config]', 'Path to the YAML configuration file')
    .option('-g, --generate', 'Only write the deployment manifest of each section')
    .option('-t, --test', 'Run every section in test mode (no remote changes)')
    .option('-s, --section <names...>', 'Deploy only the named sections')
    .option('--no-colors', 'Disable colored output');

  program.action(async (configPath: string | undefined, options: CliOptions) => {
    try {
      const config = await configService.load(configPath);
      const result = await deployCommand(config, {
        generate: options.generate,
        test: options.test,
        sections: options.section,
        colors: options.colors ? undefined : false,
      });
      process.exitCode = result.success ? 0 : 1;
    } catch (err) {
      console.error(chalk.red(`\nError: ${errorMessage(err)}\n`));
      process.exitCode = 1;
    }
  });

  await program.parseAsync();
}

main().catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
});
