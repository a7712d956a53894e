// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import fs from 'node:fs';

import {ResultEmitter} from '../../../../src/core/output/result-emitter.js';
import {type UpdateResultPayload} from '../../../../src/core/output/update-result-payload.js';
import {PathEx} from '../../../../src/business/utils/path-ex.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';
import {getTemporaryDirectory, readFile} from '../../../test-utility.js';

describe('ResultEmitter', () => {
  const payload: UpdateResultPayload = {
    old_app_version: '1.2.3',
    new_app_version: '1.3.0',
    old_chart_version: '0.4.2',
    new_chart_version: '0.5.0',
    release_type: 'minor',
    chart_modified: true,
    parent_chart_update: {path: 'charts/umbrella/Chart.yaml', old_version: '2.0.0', new_version: '2.1.0'},
    branch_name: 'update-api-1.3.0',
    has_changes: true,
  };

  let directory: string;
  let logger: RecordingLogger;
  let emitter: ResultEmitter;

  beforeEach(() => {
    directory = getTemporaryDirectory('emitter');
    logger = new RecordingLogger();
    emitter = new ResultEmitter(logger);
  });

  it('should show the payload to the user', () => {
    emitter.emit(payload);

    expect(logger.shownJson).to.deep.equal([payload]);
  });

  it('should write compact JSON to the result file, creating its directory', () => {
    const resultFile: string = PathEx.join(directory, 'out', 'deep', 'result.json');

    emitter.emit(payload, {resultFile});

    expect(readFile(resultFile)).to.equal(JSON.stringify(payload));
    expect(readFile(resultFile)).not.to.contain('\n');
  });

  it('should append the key=value outputs in order', () => {
    const githubOutput: string = PathEx.join(directory, 'github-output');
    fs.writeFileSync(githubOutput, 'previous=step\n');

    emitter.emit(payload, {githubOutput});

    expect(readFile(githubOutput)).to.equal(
      'previous=step\n' +
        'new_app_version=1.3.0\n' +
        'release_type=minor\n' +
        'new_chart_version=0.5.0\n' +
        'parent_chart_update={"path":"charts/umbrella/Chart.yaml","old_version":"2.0.0","new_version":"2.1.0"}\n' +
        'chart_modified=true\n' +
        'branch_name=update-api-1.3.0\n' +
        'has_changes=true\n',
    );
  });

  it('should not write files that were not requested', () => {
    emitter.emit(payload, {resultFile: '', githubOutput: ''});

    expect(fs.readdirSync(directory)).to.be.empty;
  });

  describe('writeKeyValueOutput', () => {
    it('should skip null and undefined values and keep empty strings', () => {
      const outputFile: string = PathEx.join(directory, 'outputs');

      emitter.writeKeyValueOutput(outputFile, {
        release_type: 'none',
        parent_chart_update: null,
        chart_modified: false,
        missing: undefined,
        branch_name: '',
      });

      expect(readFile(outputFile)).to.equal('release_type=none\nchart_modified=false\nbranch_name=\n');
    });
  });
});
