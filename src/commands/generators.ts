/**
 * Generates yargs commands from the declarative command definitions
 */

import type { Argv, Options, PositionalOptions } from 'yargs';
import { isWardenError } from '../types/index.js';
import { asError, isValidationError } from '../utils/index.js';
import { logger } from '../utils/logger.js';
import { formatCommandResult, OutputFormat } from './formatters.js';
import { CommandArgs, CommandDefinition, CommandParameter, CommandResult, ServiceContext } from './types.js';
import { readContentFromFileOrValue } from './utils.js';

export interface CliCommand {
  command: string;
  describe: string;
  builder: (yargs: Argv) => void;
}

/**
 * Prints a line of command output. Swapped out by tests.
 */
export type OutputSink = (text: string, isError: boolean) => void;

const consoleSink: OutputSink = (text, isError) => {
  if (isError) {
    console.error(text);
  } else {
    console.log(text);
  }
};

function logFailure(error: Error, commandName: string): void {
  // Errors raised on purpose are results, not crashes
  if (isWardenError(error) || isValidationError(error)) {
    logger.debug(`Command ${commandName} failed`, { code: error.code, errorMessage: error.message });
  } else {
    logger.error(`Unexpected error in command ${commandName}`, { command: commandName }, error);
  }
}

function positionalConfig(param: CommandParameter): PositionalOptions {
  return {
    describe: param.description,
    type: param.type,
    ...(param.default !== undefined && { default: param.default }),
    ...(param.choices && { choices: param.choices }),
  };
}

function optionConfig(param: CommandParameter): Options {
  return {
    type: param.type,
    describe: param.description,
    ...(param.alias !== undefined && { alias: param.alias }),
    ...(param.default !== undefined && { default: param.default }),
    ...(param.choices && { choices: param.choices }),
    ...(param.required === true && { demandOption: true }),
  };
}

/**
 * Generate CLI command configuration from command definition
 */
export function generateCliCommand<R>(def: CommandDefinition<R>): CliCommand {
  const commandParts = [def.name];
  for (const param of def.parameters.filter(p => p.positional)) {
    commandParts.push(param.required ? `<${param.name}>` : `[${param.name}]`);
  }

  const builder = (yargs: Argv): void => {
    yargs.option('format', {
      type: 'string',
      describe: 'Output format',
      choices: ['human', 'json'],
      default: 'human',
      alias: 'f',
    });

    for (const param of def.parameters) {
      if (param.positional) {
        yargs.positional(param.name, positionalConfig(param));
      } else {
        yargs.option(param.name, optionConfig(param));
      }
    }

    for (const example of def.examples ?? []) {
      yargs.example(example, '');
    }
  };

  return { command: commandParts.join(' '), describe: def.description, builder };
}

/**
 * Replace `@path` values with file contents for parameters that accept them.
 */
export function resolveFileArguments(parameters: readonly CommandParameter[], args: CommandArgs): CommandArgs {
  let resolved = args;
  for (const param of parameters) {
    const value = param.fromFile ? args.string(param.name) : undefined;
    if (value !== undefined && value.startsWith('@')) {
      resolved = resolved.with(param.name, readContentFromFileOrValue(value));
    }
  }
  return resolved;
}

/**
 * Run a definition's handler and format its result, turning thrown errors
 * into failed results. Returns the process exit code.
 */
export async function executeCommand<R>(
  def: CommandDefinition<R>,
  context: ServiceContext,
  argv: Readonly<Record<string, unknown>>,
  output: OutputSink = consoleSink
): Promise<number> {
  const format: OutputFormat = argv.format === 'json' ? 'json' : 'human';

  let result: CommandResult<R>;
  let args = new CommandArgs(argv);
  try {
    args = resolveFileArguments(def.parameters, args);
    result = await def.handler(context, args);
  } catch (error) {
    const failure = asError(error);
    logFailure(failure, def.name);
    result = { success: false, error: failure.message };
  }

  const formatted = formatCommandResult(result, format, data => def.formatResult(data, args));
  if (formatted.text) {
    output(formatted.text, formatted.exitCode !== 0);
  }
  return formatted.exitCode;
}

/**
 * Generate CLI handler from command definition. The context is created on
 * first use so `--help` never touches storage.
 */
export function generateCliHandler<R>(
  def: CommandDefinition<R>,
  getContext: () => Promise<ServiceContext>
): (argv: Readonly<Record<string, unknown>>) => Promise<void> {
  return async argv => {
    const context = await getContext();
    process.exitCode = await executeCommand(def, context, argv);
  };
}
