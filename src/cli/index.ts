#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { ContentError, defaultLogger, describeContentError } from '../core';
import { ContentGateConfig } from '../types';
import { checkCommand, listCommand, showCommand } from './commands';

const program = new Command();

program
  .name('content-gate')
  .description('Front-matter ingestion for static-site content')
  .version('1.0.0');

/**
 * Load and validate the configuration for the current directory
 */
function getConfig(): ContentGateConfig {
  const config = loadConfig(undefined, defaultLogger);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((message) => defaultLogger.error(`Config error: ${message}`));
    process.exit(1);
  }
  return config;
}

/**
 * Run a command, turning content errors into a one-line report and exit code 1
 */
async function run(command: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (error) {
    if (error instanceof ContentError) {
      defaultLogger.error(`✗ ${describeContentError(error)}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

/**
 * Check command
 */
program
  .command('check')
  .description('Validate every content file and report the ones that fail')
  .argument('[dir]', 'Content directory (defaults to contentDir from config)')
  .action(async (dir?: string) => {
    const config = getConfig();
    await run(() => checkCommand(dir ?? config.contentDir, config, defaultLogger));
  });

/**
 * List command
 */
program
  .command('list')
  .description('List publishable content, newest first')
  .argument('[dir]', 'Content directory (defaults to contentDir from config)')
  .option('-d, --drafts', 'Include drafts')
  .option('--no-future', 'Hide content dated in the future')
  .action(async (dir: string | undefined, options: { drafts?: boolean; future: boolean }) => {
    const config = getConfig();
    await run(() =>
      listCommand(
        dir ?? config.contentDir,
        config,
        // only an explicit --no-future overrides the config
        { drafts: options.drafts, future: options.future ? undefined : false },
        defaultLogger
      )
    );
  });

/**
 * Show command
 */
program
  .command('show')
  .description('Show the metadata of one content file')
  .argument('<file>', 'Content file')
  .action(async (file: string) => {
    await run(() => showCommand(file, defaultLogger));
  });

program.parseAsync().catch((error: unknown) => {
  defaultLogger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
