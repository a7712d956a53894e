// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type Argv} from 'yargs';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type ChartLogger} from '../core/logging/chart-logger.js';
import {
  type ChartUpdateOrchestrator,
  type UpdateRequest,
} from '../core/chart-update/chart-update-orchestrator.js';
import {type UpdateResultPayload} from '../core/output/update-result-payload.js';
import {type ArgvStruct, type CommandDefinition} from '../types/index.js';
import {Flags as flags} from './flags.js';

/**
 * Defines the 'update' command: the default and only command of the CLI
 */
@injectable()
export class UpdateCommand {
  public static readonly COMMAND_NAME = '$0';

  private readonly orchestrator: ChartUpdateOrchestrator;
  private readonly logger: ChartLogger;

  public constructor(
    @inject(InjectTokens.ChartUpdateOrchestrator) orchestrator?: ChartUpdateOrchestrator,
    @inject(InjectTokens.ChartLogger) logger?: ChartLogger,
  ) {
    this.orchestrator = patchInject(orchestrator, InjectTokens.ChartUpdateOrchestrator, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  public static toRequest(argv: ArgvStruct): UpdateRequest {
    return {
      helmRepoDir: flags.getString(argv, flags.helmRepoDir),
      chartFile: flags.getString(argv, flags.chartFile),
      releaseTag: flags.getString(argv, flags.releaseTag),
      parentChartFile: flags.getString(argv, flags.parentChartFile),
      resultFile: flags.getString(argv, flags.resultFile),
      appName: flags.getString(argv, flags.appName),
      githubOutput: flags.getString(argv, flags.githubOutput),
    };
  }

  public update(argv: ArgvStruct): UpdateResultPayload {
    this.logger.setDevMode(flags.getBoolean(argv, flags.devMode));
    this.logger.setLevel(flags.getString(argv, flags.logLevel));
    this.logger.debug('update command invoked', {argv});
    return this.orchestrator.handleUpdate(UpdateCommand.toRequest(argv));
  }

  /**
   * Return Yargs command definition for 'update' command
   * @returns A object representing the Yargs command definition
   */
  public getCommandDefinition(): CommandDefinition {
    return {
      command: UpdateCommand.COMMAND_NAME,
      desc: 'Update Helm chart metadata from a release tag and emit composite-action outputs',
      builder: (y: Argv): Argv => {
        flags.setRequiredCommandFlags(y, flags.helmRepoDir, flags.chartFile, flags.releaseTag);
        flags.setOptionalCommandFlags(
          y,
          flags.parentChartFile,
          flags.resultFile,
          flags.appName,
          flags.githubOutput,
          flags.devMode,
          flags.logLevel,
        );
        return y;
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        this.update(argv);
      },
    };
  }
}
