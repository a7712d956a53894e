#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0

import sourceMapSupport from 'source-map-support';
sourceMapSupport.install(); // Enable source maps for error stack traces
import * as updater from './src/index.js';
import {type ChartLogger} from './src/core/logging/chart-logger.js';
import {InjectTokens} from './src/core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {EXIT_CODE_SUCCESS, type ErrorHandler} from './src/core/error-handler.js';

const context: {logger?: ChartLogger} = {};
await updater
  .main(process.argv, context)
  .then(() => {
    process.exitCode = EXIT_CODE_SUCCESS;
    context.logger?.debug('Chart updater completed, via entrypoint');
  })
  .catch((error: unknown) => {
    const errorHandler: ErrorHandler = container.resolve<ErrorHandler>(InjectTokens.ErrorHandler);
    process.exitCode = errorHandler.handle(error);
  });
