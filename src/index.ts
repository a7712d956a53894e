// SPDX-License-Identifier: Apache-2.0

import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import * as constants from './core/constants.js';
import {type ChartLogger} from './core/logging/chart-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type UpdateCommand} from './commands/update.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
import {ChartUpdateError} from './core/errors/chart-update-error.js';
import {type CommandDefinition} from './types/index.js';
import {getToolVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: ChartLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    throw new ChartUpdateError('Error initializing container', error);
  }

  const logger: ChartLogger = container.resolve<ChartLogger>(InjectTokens.ChartLogger);

  if (context) {
    // save the logger so that the entrypoint can report errors through it
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new ChartUpdateError(`Unhandled Rejection, reason: ${JSON.stringify(reason)}`, reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new ChartUpdateError(`Uncaught Exception: ${error}, origin: ${origin}`, error));
  });

  logger.debug('Initializing commands');
  const updateCommand: UpdateCommand = container.resolve<UpdateCommand>(InjectTokens.UpdateCommand);
  const definition: CommandDefinition = updateCommand.getCommandDefinition();

  const rootCmd = yargs(hideBin(argv))
    .scriptName(constants.SCRIPT_NAME)
    .usage(`Usage:\n  ${constants.SCRIPT_NAME} [options]`)
    .version(getToolVersion())
    .alias('h', 'help')
    .alias('v', 'version')
    .command(definition.command, definition.desc, definition.builder, definition.handler)
    .strict();

  rootCmd.fail((message, error) => {
    // errors thrown by the command handler reject parseAsync() and are reported by the caller
    if (message) {
      throw new IllegalArgumentError(message, argv.slice(2).join(' '), error);
    }
  });

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
