// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import {parse} from 'yaml';

import {main} from '../../../src/index.js';
import {UpdateCommand} from '../../../src/commands/update.js';
import {type UpdateRequest} from '../../../src/core/chart-update/chart-update-orchestrator.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {DowngradeRejectedError} from '../../../src/core/errors/downgrade-rejected-error.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {type ArgvStruct} from '../../../src/types/index.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';
import {resetForTest} from '../../test-container.js';
import {getTemporaryDirectory, readFile, writeChart} from '../../test-utility.js';

describe('UpdateCommand', () => {
  describe('toRequest', () => {
    it('should map the parsed flags to an update request', () => {
      const argv: ArgvStruct = {
        _: [],
        $0: 'update-helm-chart',
        'helm-repo-dir': '/work/helm',
        'chart-file': 'charts/api/Chart.yaml',
        'release-tag': 'api-v1.4.0',
        'app-name': 'api',
        'github-output': '/tmp/outputs',
      };

      const request: UpdateRequest = UpdateCommand.toRequest(argv);

      expect(request).to.deep.equal({
        helmRepoDir: '/work/helm',
        chartFile: 'charts/api/Chart.yaml',
        releaseTag: 'api-v1.4.0',
        parentChartFile: '',
        resultFile: '',
        appName: 'api',
        githubOutput: '/tmp/outputs',
      });
    });

    it('should reject a flag of the wrong type', () => {
      const argv: ArgvStruct = {_: [], $0: 'update-helm-chart', 'helm-repo-dir': 42};

      expect(() => UpdateCommand.toRequest(argv)).to.throw(IllegalArgumentError, '--helm-repo-dir must be a string');
    });
  });

  describe('main', () => {
    let logger: RecordingLogger;
    let repoDirectory: string;
    let githubOutput: string;

    beforeEach(() => {
      logger = new RecordingLogger();
      resetForTest(undefined, logger);
      repoDirectory = getTemporaryDirectory('helm-repo');
      githubOutput = PathEx.join(getTemporaryDirectory('outputs'), 'github-output');
    });

    afterEach(() => {
      resetForTest();
    });

    it('should update the charts from the command line', async () => {
      const chartPath: string = writeChart(repoDirectory, 'charts/web/Chart.yaml', 'version: 0.3.1\nappVersion: 2.4.9\n');

      await main([
        'node',
        'update-helm-chart',
        '--helm-repo-dir',
        repoDirectory,
        '--chart-file',
        'charts/web/Chart.yaml',
        '--release-tag',
        'v2.5.0',
        '--app-name',
        'web',
        '--github-output',
        githubOutput,
        '--log-level',
        'info',
        '--dev',
      ]);

      expect(parse(readFile(chartPath))).to.deep.equal({version: '0.4.0', appVersion: '2.5.0'});
      expect(readFile(githubOutput)).to.equal(
        'new_app_version=2.5.0\n' +
          'release_type=minor\n' +
          'new_chart_version=0.4.0\n' +
          'chart_modified=true\n' +
          'branch_name=update-web-2.5.0\n' +
          'has_changes=true\n',
      );
      expect(logger.shownJson).to.have.lengthOf(1);
      expect(logger.developmentMode).to.be.true;
      expect(logger.level).to.equal('info');
    });

    it('should reject a missing required flag', async () => {
      await expect(
        main(['node', 'update-helm-chart', '--helm-repo-dir', repoDirectory, '--chart-file', 'Chart.yaml']),
      ).to.be.rejectedWith(IllegalArgumentError, 'Missing required argument: release-tag');
    });

    it('should surface errors raised while updating', async () => {
      const content = 'version: 0.9.0\nappVersion: 2.0.0\n';
      const chartPath: string = writeChart(repoDirectory, 'Chart.yaml', content);

      await expect(
        main([
          'node',
          'update-helm-chart',
          '--helm-repo-dir',
          repoDirectory,
          '--chart-file',
          'Chart.yaml',
          '--release-tag',
          'v1.0.0',
          '--github-output',
          githubOutput,
        ]),
      ).to.be.rejectedWith(DowngradeRejectedError);
      expect(readFile(chartPath)).to.equal(content);
    });
  });
});
