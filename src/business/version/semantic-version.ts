// SPDX-License-Identifier: Apache-2.0

import {SemVer} from 'semver';
import {NoSemverFoundError} from '../../core/errors/no-semver-found-error.js';
import {type Optional} from '../../types/index.js';

/**
 * A `<major>.<minor>.<patch>` triple found somewhere inside a larger string such as a release tag (`app-v1.2.3`) or
 * a chart field (`1.2.3+build`). Pre-release and build suffixes are not part of the match.
 */
export class SemanticVersion {
  private static readonly PATTERN: RegExp = /(\d+)\.(\d+)\.(\d+)/;

  private constructor(
    public readonly raw: string,
    private readonly value: SemVer,
  ) {}

  /**
   * Extract the first semantic version from the provided string.
   *
   * @param source - the string to search
   * @throws NoSemverFoundError if the string holds no version triple
   */
  public static extract(source: string): SemanticVersion {
    const match: RegExpExecArray | null = SemanticVersion.PATTERN.exec(source);
    if (!match) {
      throw new NoSemverFoundError(source);
    }

    let value: SemVer;
    try {
      // loose parsing accepts zero padded components such as 01.2.3
      value = new SemVer(match[0], {loose: true});
    } catch (error) {
      throw new NoSemverFoundError(source, error);
    }

    return new SemanticVersion(match[0], value);
  }

  public static tryExtract(source: string): Optional<SemanticVersion> {
    try {
      return SemanticVersion.extract(source);
    } catch (error) {
      if (error instanceof NoSemverFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  public get major(): number {
    return this.value.major;
  }

  public get minor(): number {
    return this.value.minor;
  }

  public get patch(): number {
    return this.value.patch;
  }

  public compare(other: SemanticVersion): number {
    return this.value.compareMain(other.value);
  }

  public isLessThan(other: SemanticVersion): boolean {
    return this.compare(other) < 0;
  }

  /** The normalized triple, without any zero padding from the source. */
  public format(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }

  public toString(): string {
    return this.raw;
  }
}
