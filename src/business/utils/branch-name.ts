// SPDX-License-Identifier: Apache-2.0

import * as constants from '../../core/constants.js';
import {SemanticVersion} from '../version/semantic-version.js';
import {type Optional} from '../../types/index.js';

export class BranchName {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  /**
   * Build the name of the branch carrying a chart update, e.g. `update-my-app-2.5.0`.
   *
   * The version is `appVersion` when given, else the version found in the release tag, else `latest`.
   */
  public static compute(appName: string, appVersion: Optional<string>, releaseTag: Optional<string>): string {
    let version: string = (appVersion ?? '').trim();
    if (!version) {
      version = SemanticVersion.tryExtract(releaseTag ?? '')?.raw ?? constants.FALLBACK_BRANCH_VERSION;
    }

    return `${constants.BRANCH_NAME_PREFIX}-${BranchName.slug(appName)}-${version}`;
  }

  public static slug(appName: string): string {
    const slug: string = appName
      .toLowerCase()
      .replaceAll(/[^a-z0-9]+/g, '-')
      .replaceAll(/^-+|-+$/g, '');
    return slug || constants.DEFAULT_BRANCH_SLUG;
  }
}
