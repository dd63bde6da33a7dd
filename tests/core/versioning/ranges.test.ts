import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  isEvaluableRange,
  isPathSpecifier,
  pathSpecifierTarget,
  rangeAdmits,
  widenRange
} from '../../../src/core/versioning/ranges.js';

describe('rangeAdmits', () => {
  it('evaluates semver ranges', () => {
    assert.equal(rangeAdmits('^1.0.0', '1.9.0'), true);
    assert.equal(rangeAdmits('^1.0.0', '2.0.0'), false);
    assert.equal(rangeAdmits('~1.2.0', '1.3.0'), false);
    assert.equal(rangeAdmits('1.2.3', '1.2.3'), true);
  });

  it('admits any version for wildcard, workspace and path specifiers', () => {
    for (const range of ['*', '', 'x', 'workspace:*', 'workspace:^', 'workspace:~', 'file:../core', 'link:../core']) {
      assert.equal(rangeAdmits(range, '9.0.0'), true, range);
    }
  });

  it('evaluates workspace ranges by their body', () => {
    assert.equal(rangeAdmits('workspace:^1.0.0', '2.0.0'), false);
    assert.equal(rangeAdmits('workspace:^1.0.0', '1.1.0'), true);
  });

  it('treats ranges semver cannot read as admitting', () => {
    assert.equal(rangeAdmits('github:acme/core', '2.0.0'), true);
    assert.equal(isEvaluableRange('github:acme/core'), false);
    assert.equal(isEvaluableRange('>=1.0.0 <2.0.0'), true);
  });
});

describe('path specifiers', () => {
  it('extracts the target directory', () => {
    assert.equal(isPathSpecifier('portal:../ui'), true);
    assert.equal(pathSpecifierTarget('file:../core'), '../core');
    assert.equal(pathSpecifierTarget('^1.0.0'), null);
  });
});

describe('widenRange', () => {
  it('keeps the operator style', () => {
    assert.equal(widenRange('^1.0.0', '2.0.0'), '^2.0.0');
    assert.equal(widenRange('~1.2.0', '1.3.0'), '~1.3.0');
    assert.equal(widenRange('1.0.0', '1.0.1'), '1.0.1');
    assert.equal(widenRange('=1.0.0', '1.0.1'), '=1.0.1');
    assert.equal(widenRange('>2.0.0', '1.5.0'), '>=1.5.0');
  });

  it('widens x-ranges', () => {
    assert.equal(widenRange('1.x', '2.0.0'), '2.x');
    assert.equal(widenRange('1.2.x', '1.3.0'), '1.3.x');
  });

  it('keeps the workspace prefix', () => {
    assert.equal(widenRange('workspace:^1.0.0', '2.0.0'), 'workspace:^2.0.0');
  });

  it('returns an admitting range unchanged', () => {
    assert.equal(widenRange('^1.0.0', '1.4.0'), '^1.0.0');
  });

  it('gives up on compound and upper-bounded ranges', () => {
    assert.equal(widenRange('>=1.0.0 <2.0.0', '2.0.0'), null);
    assert.equal(widenRange('<2.0.0', '2.1.0'), null);
    assert.equal(widenRange('^1.0.0 || ^2.0.0', '3.0.0'), null);
  });

  it('admits snapshot prereleases', () => {
    assert.equal(widenRange('^1.0.0', '1.0.1-snapshot.abc'), '^1.0.1-snapshot.abc');
  });
});
