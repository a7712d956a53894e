// SPDX-License-Identifier: Apache-2.0

import {DowngradeRejectedError} from '../../core/errors/downgrade-rejected-error.js';
import {type Optional} from '../../types/index.js';
import {ReleaseType} from './release-type.js';
import {SemanticVersion} from './semantic-version.js';

/**
 * Outcome of classifying a version change.
 *
 * A `baseline` classification is returned when there is nothing usable to compare against; the change is then
 * treated as a patch release instead of failing the update.
 */
export type Classification =
  | {kind: 'compared'; releaseType: ReleaseType; previous: SemanticVersion}
  | {kind: 'baseline'; releaseType: ReleaseType.PATCH; reason: 'missing' | 'unparsable'};

export class ReleaseClassifier {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  /**
   * Decide whether moving from `previous` to `next` is a major, minor or patch change.
   *
   * @param previous - the recorded version, absent for charts without an appVersion
   * @param next - the version being released
   * @throws DowngradeRejectedError if `next` orders before `previous`
   */
  public static classify(previous: Optional<string>, next: SemanticVersion): Classification {
    if (!previous) {
      return {kind: 'baseline', releaseType: ReleaseType.PATCH, reason: 'missing'};
    }

    const previousVersion: Optional<SemanticVersion> = SemanticVersion.tryExtract(previous);
    if (!previousVersion) {
      return {kind: 'baseline', releaseType: ReleaseType.PATCH, reason: 'unparsable'};
    }

    if (next.isLessThan(previousVersion)) {
      throw new DowngradeRejectedError(next.format(), previousVersion.format());
    }

    return {
      kind: 'compared',
      releaseType: ReleaseClassifier.firstDifference(previousVersion, next),
      previous: previousVersion,
    };
  }

  private static firstDifference(previous: SemanticVersion, next: SemanticVersion): ReleaseType {
    if (next.major !== previous.major) {
      return ReleaseType.MAJOR;
    }
    if (next.minor !== previous.minor) {
      return ReleaseType.MINOR;
    }
    if (next.patch !== previous.patch) {
      return ReleaseType.PATCH;
    }

    return ReleaseType.NONE;
  }
}
