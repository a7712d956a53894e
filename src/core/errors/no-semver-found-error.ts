// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class NoSemverFoundError extends ChartUpdateError {
  /**
   * Raised when a string carries no `<major>.<minor>.<patch>` sequence
   *
   * error metadata will include `input`
   *
   * @param input - the string that was searched
   * @param cause - source error (if any)
   */
  public constructor(input: string, cause: unknown = {}) {
    super(`Unable to find semantic version inside '${input}'.`, cause, {input});
  }
}
