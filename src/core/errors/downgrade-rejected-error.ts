// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class DowngradeRejectedError extends ChartUpdateError {
  /**
   * error metadata will include `newVersion` and `existingVersion`
   *
   * @param newVersion - the version that was requested
   * @param existingVersion - the version currently recorded in the chart
   */
  public constructor(newVersion: string, existingVersion: string) {
    super(`New version ${newVersion} is older than existing appVersion ${existingVersion}.`, {}, {
      newVersion,
      existingVersion,
    });
  }
}
