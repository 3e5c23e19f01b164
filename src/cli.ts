#!/usr/bin/env node

/**
 * Warden CLI - generated from the command definitions
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import yargs, { type Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from './utils/chalk.js';
import { loadConfig } from './config/index.js';
import { createStorageProvider } from './storage/index.js';
import { createServiceContext } from './commands/context.js';
import { COMMAND_DEFINITIONS, COMMAND_GROUPS } from './commands/index.js';
import { generateCliCommand, generateCliHandler } from './commands/generators.js';
import { CommandDefinition, ServiceContext } from './commands/types.js';
import { asError } from './utils/index.js';
import { logger } from './utils/logger.js';

/**
 * Build and run the CLI against `args`. Storage is opened on the first
 * command that needs it and closed before returning.
 */
export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  const opened: { context?: ServiceContext } = {};

  const getContext = async (): Promise<ServiceContext> => {
    if (opened.context) return opened.context;
    const config = loadConfig();
    logger.setLogLevel(config.logging.level);
    const storage = createStorageProvider(config);
    await storage.initialize();
    const context = createServiceContext(config, storage);
    opened.context = context;
    return context;
  };

  const register = (cli: Argv, def: CommandDefinition): void => {
    const { command, describe, builder } = generateCliCommand(def);
    cli.command(command, describe, builder, generateCliHandler(def, getContext));
  };

  const cli = yargs(args)
    .scriptName('warden')
    .usage('$0 <command> [options]')
    .demandCommand(1, 'You need at least one command before moving on')
    .strict()
    .fail((msg, err) => {
      throw err ?? new Error(`${msg}\n\nRun --help to see available commands and options`);
    })
    .help()
    .version()
    .alias('h', 'help');

  for (const def of COMMAND_DEFINITIONS) {
    if (!def.group) register(cli, def);
  }

  for (const [group, describe] of Object.entries(COMMAND_GROUPS)) {
    cli.command(group, describe, groupCli => {
      for (const def of COMMAND_DEFINITIONS) {
        if (def.group === group) register(groupCli, def);
      }
      groupCli.demandCommand(1, `Choose a ${group} subcommand`);
    });
  }

  try {
    await cli.parseAsync();
  } finally {
    if (opened.context) {
      await opened.context.storage.close();
    }
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    // argv[1] is not a file, e.g. under a REPL
    return false;
  }
}

if (isEntryPoint()) {
  runCLI().catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), asError(error).message);
    process.exitCode = 1;
  });
}
