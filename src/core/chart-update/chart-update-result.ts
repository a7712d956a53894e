// SPDX-License-Identifier: Apache-2.0

import {type ReleaseType} from '../../business/version/release-type.js';

/**
 * Before and after state of a single Chart.yaml update
 */
export class ChartUpdateResult {
  public constructor(
    public readonly oldAppVersion: string,
    public readonly newAppVersion: string,
    public readonly oldChartVersion: string,
    public readonly newChartVersion: string,
    public readonly releaseType: ReleaseType,
    public readonly chartModified: boolean,
  ) {}
}
