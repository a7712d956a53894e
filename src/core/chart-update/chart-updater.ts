// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type ChartLogger} from '../logging/chart-logger.js';
import * as constants from '../constants.js';
import {type ChartMetadataStore} from '../../data/chart/chart-metadata-store.js';
import {type ChartMetadataDocument} from '../../data/chart/chart-metadata-document.js';
import {ReleaseType, type ReleaseTypeSelection} from '../../business/version/release-type.js';
import {SemanticVersion} from '../../business/version/semantic-version.js';
import {type Classification, ReleaseClassifier} from '../../business/version/release-classifier.js';
import {VersionBumper} from '../../business/version/version-bumper.js';
import {ChartUpdateResult} from './chart-update-result.js';

@injectable()
export class ChartUpdater {
  private readonly store: ChartMetadataStore;
  private readonly logger: ChartLogger;

  public constructor(
    @inject(InjectTokens.ChartMetadataStore) store?: ChartMetadataStore,
    @inject(InjectTokens.ChartLogger) logger?: ChartLogger,
  ) {
    this.store = patchInject(store, InjectTokens.ChartMetadataStore, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  /**
   * Set the chart's appVersion to `newVersion` and bump its chart version.
   *
   * Nothing is written when the resolved release type is `none`. A chart without an appVersion key keeps it absent and
   * only has its chart version bumped.
   *
   * @param chartPath - location of the Chart.yaml
   * @param newVersion - the application version being released
   * @param selection - classify against the chart's appVersion, or use a fixed release type
   */
  public updateChart(chartPath: string, newVersion: string, selection: ReleaseTypeSelection): ChartUpdateResult {
    const chart: ChartMetadataDocument = this.store.load(chartPath);
    const oldAppVersion: string | undefined = chart.appVersion;
    const oldChartVersion: string = this.store.ensureVersionField(chart);

    const next: SemanticVersion = SemanticVersion.extract(newVersion);
    const releaseType: ReleaseType = this.resolveReleaseType(selection, oldAppVersion, next);

    let newChartVersion: string = oldChartVersion;
    const chartModified: boolean = releaseType !== ReleaseType.NONE;
    if (chartModified) {
      if (chart.hasAppVersion()) {
        chart.set(constants.CHART_APP_VERSION_KEY, newVersion);
      }
      newChartVersion = VersionBumper.bump(oldChartVersion, releaseType);
      chart.set(constants.CHART_VERSION_KEY, newChartVersion);
      this.store.save(chartPath, chart);
      this.logger.info(`${chartPath}: ${releaseType} release, chart version ${oldChartVersion} -> ${newChartVersion}`);
    } else {
      this.logger.info(`${chartPath}: appVersion already at ${newVersion}, nothing to update`);
    }

    return new ChartUpdateResult(
      oldAppVersion ?? '',
      newVersion,
      oldChartVersion,
      newChartVersion,
      releaseType,
      chartModified,
    );
  }

  private resolveReleaseType(
    selection: ReleaseTypeSelection,
    oldAppVersion: string | undefined,
    next: SemanticVersion,
  ): ReleaseType {
    if (selection.kind === 'fixed') {
      return selection.releaseType;
    }

    const classification: Classification = ReleaseClassifier.classify(oldAppVersion, next);
    if (classification.kind === 'baseline') {
      this.logger.warn(`no comparable appVersion (${classification.reason}), treating as a patch release`);
    }
    return classification.releaseType;
  }
}
