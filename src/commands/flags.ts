// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/index.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setRequiredCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        alias: flag.definition.alias,
        demandOption: true,
      });
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        alias: flag.definition.alias,
        default: flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue,
      });
    }
  }

  /**
   * Read a string flag, falling back to its default value and then to an empty string
   * @throws IllegalArgumentError if the parsed value is not a string
   */
  public static getString(argv: ArgvStruct, flag: CommandFlag): string {
    const value: unknown = argv[flag.name] ?? flag.definition.defaultValue ?? '';
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`--${flag.name} must be a string`, value);
    }
    return value;
  }

  public static getBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    const value: unknown = argv[flag.name] ?? flag.definition.defaultValue ?? false;
    if (typeof value !== 'boolean') {
      throw new IllegalArgumentError(`--${flag.name} must be a boolean`, value);
    }
    return value;
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly logLevel: CommandFlag = {
    constName: 'logLevel',
    name: 'log-level',
    definition: {
      describe: 'Level of the messages written to the log file',
      defaultValue: constants.CHART_UPDATER_LOG_LEVEL,
      type: 'string',
    },
  };

  public static readonly helmRepoDir: CommandFlag = {
    constName: 'helmRepoDir',
    name: 'helm-repo-dir',
    definition: {
      describe: 'Path to the repository holding the chart metadata files',
      type: 'string',
    },
  };

  public static readonly chartFile: CommandFlag = {
    constName: 'chartFile',
    name: 'chart-file',
    definition: {
      describe: 'Chart.yaml of the application, relative to --helm-repo-dir',
      type: 'string',
    },
  };

  public static readonly parentChartFile: CommandFlag = {
    constName: 'parentChartFile',
    name: 'parent-chart-file',
    definition: {
      describe: 'Chart.yaml of a parent chart bumped in lockstep, relative to --helm-repo-dir',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly releaseTag: CommandFlag = {
    constName: 'releaseTag',
    name: 'release-tag',
    definition: {
      describe: 'Release tag the new application version is read from, e.g. app-v1.2.3',
      type: 'string',
    },
  };

  public static readonly resultFile: CommandFlag = {
    constName: 'resultFile',
    name: 'result-file',
    definition: {
      describe: 'File that also receives the JSON result',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly appName: CommandFlag = {
    constName: 'appName',
    name: 'app-name',
    definition: {
      describe: 'Application name used to derive the update branch name',
      defaultValue: '',
      type: 'string',
    },
  };

  public static readonly githubOutput: CommandFlag = {
    constName: 'githubOutput',
    name: 'github-output',
    definition: {
      describe: 'File receiving key=value outputs, defaults to $GITHUB_OUTPUT',
      defaultValue: constants.GITHUB_OUTPUT_FILE,
      type: 'string',
    },
  };
}
