// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type ChartLogger} from '../logging/chart-logger.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type OutputValue, type UpdateResultPayload} from './update-result-payload.js';

export interface EmitOptions {
  resultFile?: string;
  githubOutput?: string;
}

/**
 * Reports the result of an update run: pretty printed JSON on stdout, compact JSON in the optional result file, and
 * key=value lines appended to the optional GitHub Actions output file.
 */
@injectable()
export class ResultEmitter {
  private readonly logger: ChartLogger;

  public constructor(@inject(InjectTokens.ChartLogger) logger?: ChartLogger) {
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  public emit(payload: UpdateResultPayload, options: EmitOptions = {}): void {
    if (options.resultFile) {
      this.writeResultFile(options.resultFile, payload);
    }

    this.logger.showJSON('Chart update result', payload);

    if (options.githubOutput) {
      this.writeKeyValueOutput(options.githubOutput, {
        new_app_version: payload.new_app_version,
        release_type: payload.release_type,
        new_chart_version: payload.new_chart_version,
        parent_chart_update: payload.parent_chart_update,
        chart_modified: payload.chart_modified,
        branch_name: payload.branch_name,
        has_changes: payload.has_changes,
      });
    }
  }

  public writeResultFile(resultFile: string, payload: UpdateResultPayload): void {
    fs.mkdirSync(PathEx.dirname(resultFile), {recursive: true});
    fs.writeFileSync(resultFile, JSON.stringify(payload), 'utf8');
    this.logger.debug(`wrote result to ${resultFile}`);
  }

  /**
   * Append one `key=value` line per entry. Entries without a value are skipped.
   */
  public writeKeyValueOutput(outputFile: string, entries: Record<string, OutputValue>): void {
    const lines: string[] = [];
    for (const [key, value] of Object.entries(entries)) {
      if (value === null || value === undefined) {
        continue;
      }
      lines.push(`${key}=${ResultEmitter.serialize(value)}\n`);
    }

    fs.appendFileSync(outputFile, lines.join(''), 'utf8');
    this.logger.debug(`appended ${lines.length} outputs to ${outputFile}`);
  }

  private static serialize(value: string | boolean | object): string {
    if (typeof value === 'boolean') {
      return value ? 'true' : 'false';
    }
    if (typeof value === 'object') {
      return JSON.stringify(value);
    }
    return value;
  }
}
