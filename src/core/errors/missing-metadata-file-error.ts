// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class MissingMetadataFileError extends ChartUpdateError {
  public constructor(path: string) {
    super(`Expected Chart.yaml at '${path}' but the file does not exist.`, {}, {path});
  }
}
