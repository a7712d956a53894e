// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

// NOTE: DO NOT add any project imports in this file to avoid circular dependencies

/**
 * Generic type for representing optional types
 */
export type Optional<T> = T | undefined;

/**
 * Parsed command line arguments as handed to a command handler
 */
export interface ArgvStruct {
  _: Array<string | number>;
  $0: string;
  [argumentName: string]: unknown;
}

export interface CommandDefinition {
  command: string;
  desc: string;
  builder: (y: Argv) => Argv;
  handler: (argv: ArgvStruct) => Promise<void>;
}
