// SPDX-License-Identifier: Apache-2.0

import {type Document, isScalar} from 'yaml';
import * as constants from '../../core/constants.js';
import {type Optional} from '../../types/index.js';

/**
 * A parsed Chart.yaml. Values are read and written through the underlying YAML document so that key order, comments
 * and quoting of untouched entries survive a save.
 */
export class ChartMetadataDocument {
  public constructor(
    public readonly path: string,
    private readonly document: Document.Parsed,
  ) {}

  public has(key: string): boolean {
    return this.document.has(key);
  }

  public get(key: string): unknown {
    return this.document.get(key);
  }

  public set(key: string, value: string): void {
    this.document.set(key, value);
  }

  public get version(): unknown {
    return this.get(constants.CHART_VERSION_KEY);
  }

  /**
   * The recorded application version: `undefined` when the key is absent, an empty string when it is present without
   * a value. A value YAML reads as a number (`appVersion: 1.0`) is returned as written in the file.
   */
  public get appVersion(): Optional<string> {
    if (!this.has(constants.CHART_APP_VERSION_KEY)) {
      return undefined;
    }

    const node: unknown = this.document.get(constants.CHART_APP_VERSION_KEY, true);
    if (!isScalar(node)) {
      return String(this.get(constants.CHART_APP_VERSION_KEY));
    }
    if (node.value === null || node.value === undefined) {
      return '';
    }
    // source is only kept for parsed scalars and goes stale once the value is replaced
    return typeof node.value === 'string' ? node.value : (node.source ?? String(node.value));
  }

  public hasAppVersion(): boolean {
    return this.has(constants.CHART_APP_VERSION_KEY);
  }

  public toString(): string {
    // lineWidth 0 keeps long descriptions on one line
    return this.document.toString({lineWidth: 0});
  }
}
