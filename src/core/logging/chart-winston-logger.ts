// SPDX-License-Identifier: Apache-2.0

import * as winston from 'winston';
import {v4 as uuidv4} from 'uuid';
import chalk from 'chalk';
import * as constants from '../constants.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ChartLogger} from './chart-logger.js';

const customFormat = winston.format.combine(
  winston.format.label({label: 'CHART-UPDATER', message: false}),

  winston.format.splat(),

  // include timestamp in logs
  winston.format.timestamp(),

  winston.format.ms(),

  // convert levels to upper case
  winston.format(data => {
    data.level = data.level.toUpperCase();
    return data;
  })(),

  // Ignore log messages if they have { private: true }
  winston.format(data => (data.private ? false : data))(),
);

@injectable()
export class ChartWinstonLogger implements ChartLogger {
  private readonly winstonLogger: winston.Logger;
  private traceId?: string;

  /**
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - directory receiving the log file
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) private developmentMode?: boolean | null,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    logLevel = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    logsDirectory = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    this.winstonLogger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(customFormat, winston.format.json()),
      transports: [
        new winston.transports.File({filename: PathEx.join(logsDirectory, constants.CHART_UPDATER_LOG_FILE)}),
      ],
    });
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public setLevel(level: string): void {
    this.winstonLogger.level = level;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  /**
   * Prints the single diagnostic line the calling workflow greps for on stderr. Developer mode follows it with the
   * stack trace of the error and of every cause.
   */
  public showUserError(error: unknown): void {
    const message: string = error instanceof Error ? error.message : String(error);
    console.error(`${constants.ERROR_PREFIX} ${message}`);

    if (this.developmentMode && error instanceof Error) {
      let indent = '';
      let prefix = '';
      let current: unknown = error;
      let depth = 0;
      while (current instanceof Error && depth < 10) {
        // drop the "Caused by" tail appended by ChartUpdateError, each cause is printed on its own
        const stacktrace = (current.stack ?? '').replace(/Caused by:.*/s, '').trim();
        console.error(indent + prefix + chalk.yellow(current.message));
        console.error(indent + chalk.gray(stacktrace.replace(/\n\s*/g, '\n' + indent)) + '\n');
        indent += '  ';
        prefix = 'Caused by: ';
        current = current.cause;
        depth += 1;
      }
    }

    this.error(message, {stack: error instanceof Error ? error.stack : undefined});
  }

  public error(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.error(message, ...arguments_, this.prepMeta());
  }

  public warn(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.warn(message, ...arguments_, this.prepMeta());
  }

  public info(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.info(message, ...arguments_, this.prepMeta());
  }

  public debug(message: string, ...arguments_: unknown[]): void {
    this.winstonLogger.debug(message, ...arguments_, this.prepMeta());
  }

  public showJSON(title: string, object: object): void {
    this.debug(title);
    console.log(JSON.stringify(object, null, 2));
  }
}
