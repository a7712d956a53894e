// SPDX-License-Identifier: Apache-2.0

import {ChartUpdateError} from './chart-update-error.js';

export class MetadataParseError extends ChartUpdateError {
  /**
   * Raised when a chart metadata file is not a YAML mapping
   *
   * error metadata will include `path`
   *
   * @param message - error message
   * @param path - the file that failed to parse
   * @param cause - source error (if any)
   */
  public constructor(message: string, path: string, cause: unknown = {}) {
    super(message, cause, {path});
  }
}
