// SPDX-License-Identifier: Apache-2.0

export enum ReleaseType {
  NONE = 'none',
  PATCH = 'patch',
  MINOR = 'minor',
  MAJOR = 'major',
}

/**
 * How the release type of a chart update is chosen.
 * - auto: classify the new version against the chart's current appVersion
 * - fixed: use the given type, as when a parent chart follows its child
 */
export type ReleaseTypeSelection = {kind: 'auto'} | {kind: 'fixed'; releaseType: ReleaseType};

export const ReleaseTypeSelection = {
  auto(): ReleaseTypeSelection {
    return {kind: 'auto'};
  },

  fixed(releaseType: ReleaseType): ReleaseTypeSelection {
    return {kind: 'fixed', releaseType};
  },
};
