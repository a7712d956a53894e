// SPDX-License-Identifier: Apache-2.0

export interface ChartLogger {
  setDevMode(developmentMode: boolean): void;

  setLevel(level: string): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  showUserError(error: unknown): void;

  error(message: string, ...arguments_: unknown[]): void;

  warn(message: string, ...arguments_: unknown[]): void;

  info(message: string, ...arguments_: unknown[]): void;

  debug(message: string, ...arguments_: unknown[]): void;

  showJSON(title: string, object: object): void;
}
