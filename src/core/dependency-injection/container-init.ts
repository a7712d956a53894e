// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type ChartLogger} from '../logging/chart-logger.js';
import {ChartWinstonLogger} from '../logging/chart-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {ChartMetadataStore} from '../../data/chart/chart-metadata-store.js';
import {ChartUpdater} from '../chart-update/chart-updater.js';
import {ResultEmitter} from '../output/result-emitter.js';
import {ChartUpdateOrchestrator} from '../chart-update/chart-update-orchestrator.js';
import {UpdateCommand} from '../../commands/update.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logsDirectory - the directory receiving the log file, defaults to constants.CHART_UPDATER_LOGS_DIR
   * @param logLevel - the log level to use, defaults to constants.CHART_UPDATER_LOG_LEVEL
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logsDirectory: string = constants.CHART_UPDATER_LOGS_DIR,
    logLevel: string = constants.CHART_UPDATER_LOG_LEVEL,
    developmentMode: boolean = false,
    testLogger?: ChartLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<ChartLogger>(InjectTokens.ChartLogger).debug('Container already initialized');
      return;
    }

    // ChartLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogsDirectory, {useValue: logsDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.ChartLogger, testLogger);
      container.resolve<ChartLogger>(InjectTokens.ChartLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.ChartLogger, {useClass: ChartWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<ChartLogger>(InjectTokens.ChartLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    // Data Layer
    container.register(
      InjectTokens.ChartMetadataStore,
      {useClass: ChartMetadataStore},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ChartUpdater, {useClass: ChartUpdater}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ResultEmitter, {useClass: ResultEmitter}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.ChartUpdateOrchestrator,
      {useClass: ChartUpdateOrchestrator},
      {lifecycle: Lifecycle.Singleton},
    );

    // Commands
    container.register(InjectTokens.UpdateCommand, {useClass: UpdateCommand}, {lifecycle: Lifecycle.Singleton});

    container.resolve<ChartLogger>(InjectTokens.ChartLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logsDirectory - the directory receiving the log file
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logsDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: ChartLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<ChartLogger>(InjectTokens.ChartLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logsDirectory, logLevel, developmentMode, testLogger);
  }
}
