// SPDX-License-Identifier: Apache-2.0

import {inc} from 'semver';
import {UnsupportedReleaseTypeError} from '../../core/errors/unsupported-release-type-error.js';
import {ReleaseType} from './release-type.js';
import {SemanticVersion} from './semantic-version.js';

export class VersionBumper {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  /**
   * Increment the version found in `version` according to the release type. Lower order components are reset to zero,
   * and any prefix or suffix around the triple is dropped from the result.
   *
   * @param version - a string carrying a version triple
   * @param releaseType - major, minor or patch
   * @throws UnsupportedReleaseTypeError for any other release type
   */
  public static bump(version: string, releaseType: ReleaseType): string {
    const current: string = SemanticVersion.extract(version).format();

    let next: string | null;
    switch (releaseType) {
      case ReleaseType.MAJOR: {
        next = inc(current, 'major');
        break;
      }
      case ReleaseType.MINOR: {
        next = inc(current, 'minor');
        break;
      }
      case ReleaseType.PATCH: {
        next = inc(current, 'patch');
        break;
      }
      default: {
        throw new UnsupportedReleaseTypeError(String(releaseType));
      }
    }

    if (next === null) {
      throw new UnsupportedReleaseTypeError(releaseType);
    }

    return next;
  }
}
