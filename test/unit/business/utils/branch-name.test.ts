// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import each from 'mocha-each';
import {BranchName} from '../../../../src/business/utils/branch-name.js';

describe('BranchName', (): void => {
  it('should slug the application name and append the version', (): void => {
    expect(BranchName.compute('My App!', '2.5.0', 'v2.5.0')).to.equal('update-my-app-2.5.0');
  });

  each([
    {appName: 'billing-service', slug: 'billing-service'},
    {appName: '  Billing   Service  ', slug: 'billing-service'},
    {appName: '--Edge__Case--', slug: 'edge-case'},
    {appName: 'API v2', slug: 'api-v2'},
    {appName: '!!!', slug: 'app'},
    {appName: '', slug: 'app'},
  ]).it('should build the slug', ({appName, slug}: {appName: string; slug: string}): void => {
    expect(BranchName.slug(appName)).to.equal(slug);
  });

  it('should fall back to the version in the release tag', (): void => {
    expect(BranchName.compute('web', '  ', 'web-v3.1.4')).to.equal('update-web-3.1.4');
    expect(BranchName.compute('web', undefined, 'web-v3.1.4')).to.equal('update-web-3.1.4');
  });

  it('should fall back to latest when the release tag has no version', (): void => {
    expect(BranchName.compute('web', '', 'nightly')).to.equal('update-web-latest');
    expect(BranchName.compute('web', undefined, undefined)).to.equal('update-web-latest');
  });

  it('should trim the application version', (): void => {
    expect(BranchName.compute('web', ' 1.0.0 ', 'v2.0.0')).to.equal('update-web-1.0.0');
  });
});
