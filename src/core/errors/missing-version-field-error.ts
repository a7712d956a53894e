// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class MissingVersionFieldError extends ChartUpdateError {
  public constructor(path: string) {
    super(`Chart.yaml at '${path}' is missing a string 'version' field.`, {}, {path});
  }
}
