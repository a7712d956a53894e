// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import each from 'mocha-each';
import {SemanticVersion} from '../../../../src/business/version/semantic-version.js';
import {NoSemverFoundError} from '../../../../src/core/errors/no-semver-found-error.js';

describe('SemanticVersion', (): void => {
  each([
    {input: '1.2.3', raw: '1.2.3', triple: [1, 2, 3]},
    {input: 'v1.2.3', raw: '1.2.3', triple: [1, 2, 3]},
    {input: 'app-v1.2.3', raw: '1.2.3', triple: [1, 2, 3]},
    {input: 'v1.2.3+build.7', raw: '1.2.3', triple: [1, 2, 3]},
    {input: 'release/10.20.30-rc.1', raw: '10.20.30', triple: [10, 20, 30]},
    {input: 'tag 0.0.0', raw: '0.0.0', triple: [0, 0, 0]},
    {input: '1.2.3.4', raw: '1.2.3', triple: [1, 2, 3]},
    {input: 'v2-app-3.4.5 then 6.7.8', raw: '3.4.5', triple: [3, 4, 5]},
  ]).it('should extract the first version triple', ({input, raw, triple}: {input: string; raw: string; triple: number[]}): void => {
    const version: SemanticVersion = SemanticVersion.extract(input);
    expect(version.raw).to.equal(raw);
    expect([version.major, version.minor, version.patch]).to.deep.equal(triple);
  });

  it('should keep zero padded components in the raw match and drop them from the formatted triple', (): void => {
    const version: SemanticVersion = SemanticVersion.extract('v01.02.003');
    expect(version.raw).to.equal('01.02.003');
    expect(version.format()).to.equal('1.2.3');
    expect(version.toString()).to.equal('01.02.003');
  });

  each(['', 'latest', 'v1.2', '1..2.3', 'a.b.c']).it('should reject %s without a version triple', (input: string): void => {
    expect(() => SemanticVersion.extract(input)).to.throw(
      NoSemverFoundError,
      `Unable to find semantic version inside '${input}'.`,
    );
  });

  it('should name the input in the error metadata', (): void => {
    expect(() => SemanticVersion.extract('nightly'))
      .to.throw(NoSemverFoundError)
      .with.property('meta')
      .that.deep.equals({input: 'nightly'});
  });

  it('should reject components larger than a safe integer', (): void => {
    expect(() => SemanticVersion.extract('v99999999999999999999.0.0')).to.throw(NoSemverFoundError);
  });

  it('should return undefined from tryExtract when there is no version', (): void => {
    expect(SemanticVersion.tryExtract('main')).to.be.undefined;
    expect(SemanticVersion.tryExtract('v4.5.6')?.format()).to.equal('4.5.6');
  });

  it('should compare triples lexicographically', (): void => {
    const v123: SemanticVersion = SemanticVersion.extract('1.2.3');
    expect(v123.compare(SemanticVersion.extract('1.2.4'))).to.equal(-1);
    expect(v123.compare(SemanticVersion.extract('1.10.0'))).to.equal(-1);
    expect(v123.compare(SemanticVersion.extract('0.9.9'))).to.equal(1);
    expect(v123.compare(SemanticVersion.extract('v1.2.3-rc.1'))).to.equal(0);
    expect(SemanticVersion.extract('2.0.0').isLessThan(SemanticVersion.extract('10.0.0'))).to.be.true;
  });
});
