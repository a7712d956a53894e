// SPDX-License-Identifier: Apache-2.0

import {type PositionalOptionsType} from 'yargs';

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string;
  alias?: string;
  type: PositionalOptionsType;
}
