// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type ChartLogger} from './logging/chart-logger.js';
import {ChartUpdateError} from './errors/chart-update-error.js';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_FAILURE = 1;

@injectable()
export class ErrorHandler {
  private readonly logger: ChartLogger;

  public constructor(@inject(InjectTokens.ChartLogger) logger?: ChartLogger) {
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  /**
   * Report the error once and map it to the process exit code
   */
  public handle(error: unknown): number {
    if (!(error instanceof ChartUpdateError)) {
      this.logger.debug('unexpected error type', {type: error instanceof Error ? error.name : typeof error});
    }
    this.logger.showUserError(error);
    return EXIT_CODE_FAILURE;
  }
}
