// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {isMap, parseDocument} from 'yaml';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type ChartLogger} from '../../core/logging/chart-logger.js';
import {MissingMetadataFileError} from '../../core/errors/missing-metadata-file-error.js';
import {MissingVersionFieldError} from '../../core/errors/missing-version-field-error.js';
import {MetadataParseError} from '../../core/errors/metadata-parse-error.js';
import {ChartMetadataDocument} from './chart-metadata-document.js';

/**
 * Reads and writes Chart.yaml files. The store does not interpret the charts beyond checking that they hold a
 * mapping with a string `version`.
 */
@injectable()
export class ChartMetadataStore {
  private readonly logger: ChartLogger;

  public constructor(@inject(InjectTokens.ChartLogger) logger?: ChartLogger) {
    this.logger = patchInject(logger, InjectTokens.ChartLogger, this.constructor.name);
  }

  /**
   * @param path - location of the Chart.yaml
   * @throws MissingMetadataFileError if the file does not exist
   * @throws MetadataParseError if the file is not valid YAML or does not hold a mapping
   */
  public load(path: string): ChartMetadataDocument {
    if (!fs.existsSync(path)) {
      throw new MissingMetadataFileError(path);
    }

    let data: string;
    try {
      data = fs.readFileSync(path, 'utf8');
    } catch (error) {
      throw new MetadataParseError(`error reading chart metadata file: ${path}`, path, error);
    }

    const document = parseDocument(data);
    if (document.errors.length > 0) {
      const [error] = document.errors;
      throw new MetadataParseError(`error parsing yaml file: ${path}: ${error.message.split('\n')[0]}`, path, error);
    }

    if (document.contents !== null && !isMap(document.contents)) {
      throw new MetadataParseError(`chart metadata file does not hold a mapping: ${path}`, path);
    }

    this.logger.debug(`loaded chart metadata from ${path}`);
    return new ChartMetadataDocument(path, document);
  }

  public save(path: string, document: ChartMetadataDocument): void {
    fs.writeFileSync(path, document.toString(), {encoding: 'utf8', flag: 'w'});
    this.logger.debug(`saved chart metadata to ${path}`);
  }

  /**
   * @returns the chart version
   * @throws MissingVersionFieldError if `version` is absent or not a string
   */
  public ensureVersionField(document: ChartMetadataDocument): string {
    const version: unknown = document.version;
    if (typeof version !== 'string') {
      throw new MissingVersionFieldError(document.path);
    }
    return version;
  }
}
