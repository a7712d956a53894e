// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  ChartLogger: Symbol.for('ChartLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ChartMetadataStore: Symbol.for('ChartMetadataStore'),
  ChartUpdater: Symbol.for('ChartUpdater'),
  ResultEmitter: Symbol.for('ResultEmitter'),
  ChartUpdateOrchestrator: Symbol.for('ChartUpdateOrchestrator'),
  UpdateCommand: Symbol.for('UpdateCommand'),
};
