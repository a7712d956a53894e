// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type ChartLogger} from '../logging/chart-logger.js';
import {type ChartUpdater} from './chart-updater.js';
import {type ChartUpdateResult} from './chart-update-result.js';
import {type ResultEmitter} from '../output/result-emitter.js';
import {type ParentChartUpdate, type UpdateResultPayload} from '../output/update-result-payload.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {BranchName} from '../../business/utils/branch-name.js';
import {ReleaseType, ReleaseTypeSelection} from '../../business/version/release-type.js';
import {SemanticVersion} from '../../business/version/semantic-version.js';

export interface UpdateRequest {
  /** repository holding the charts; chart paths are relative to it */
  helmRepoDir: string;
  chartFile: string;
  releaseTag: string;
  parentChartFile?: string;
  resultFile?: string;
  appName?: string;
  githubOutput?: string;
}

@injectable()
export class ChartUpdateOrchestrator {
  private readonly chartUpdater: ChartUpdater;
  private readonly resultEmitter: ResultEmitter;
  private readonly logger: ChartLogger;

  public constructor(
    @inject(InjectTokens.ChartUpdater) chartUpdater?: ChartUpdater,
    @inject(InjectTokens.ResultEmitter) resultEmitter?: ResultEmitter,
    @inject(InjectTokens.ChartLogger) logger?: ChartLogger,
  ) {
    this.chartUpdater = patchInject(chartUpdater, InjectTokens.ChartUpdater, this.constructor.name);
    this.resultEmitter = patchInject(resultEmitter, InjectTokens.ResultEmitter, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  /**
   * Update the application chart from a release tag, bump the parent chart in lockstep, and report the outcome.
   *
   * The parent chart is bumped by the release type resolved for the application chart, never by comparing against its
   * own appVersion. It is only touched when the application chart changed. A parent failure does not roll back the
   * application chart, which has already been written at that point.
   */
  public handleUpdate(request: UpdateRequest): UpdateResultPayload {
    const helmRepoDirectory: string = PathEx.resolve(request.helmRepoDir);
    const chartPath: string = PathEx.resolve(helmRepoDirectory, request.chartFile);

    const newVersion: string = SemanticVersion.extract(request.releaseTag).raw;
    this.logger.info(`release tag ${request.releaseTag} resolves to application version ${newVersion}`);

    const result: ChartUpdateResult = this.chartUpdater.updateChart(chartPath, newVersion, ReleaseTypeSelection.auto());

    let parentUpdate: ParentChartUpdate | null = null;
    const parentChartFile: string = (request.parentChartFile ?? '').trim();
    if (parentChartFile && result.releaseType !== ReleaseType.NONE) {
      const parentResult: ChartUpdateResult = this.chartUpdater.updateChart(
        PathEx.resolve(helmRepoDirectory, parentChartFile),
        newVersion,
        ReleaseTypeSelection.fixed(result.releaseType),
      );
      if (parentResult.chartModified) {
        parentUpdate = {
          path: parentChartFile,
          old_version: parentResult.oldChartVersion,
          new_version: parentResult.newChartVersion,
        };
      }
    }

    let branchName: string = '';
    if (request.appName) {
      branchName = BranchName.compute(request.appName, result.newAppVersion, request.releaseTag);
    }

    const payload: UpdateResultPayload = {
      old_app_version: result.oldAppVersion,
      new_app_version: result.newAppVersion,
      old_chart_version: result.oldChartVersion,
      new_chart_version: result.newChartVersion,
      release_type: result.releaseType,
      chart_modified: result.chartModified,
      parent_chart_update: parentUpdate,
      branch_name: branchName,
      has_changes: result.chartModified || parentUpdate !== null,
    };

    this.resultEmitter.emit(payload, {resultFile: request.resultFile, githubOutput: request.githubOutput});
    return payload;
  }
}
