// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class UnsupportedReleaseTypeError extends ChartUpdateError {
  public constructor(releaseType: string) {
    super(`Unsupported release type '${releaseType}'.`, {}, {releaseType});
  }
}
