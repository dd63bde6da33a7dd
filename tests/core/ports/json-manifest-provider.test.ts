import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { JsonManifestProvider } from '../../../src/core/ports/json-manifest-provider.js';
import { WorkspaceError } from '../../../src/utils/errors.js';

const provider = new JsonManifestProvider();

const MANIFEST = [
  '{',
  '  "name": "@acme/app",',
  '  "version": "1.0.0",',
  '  "dependencies": {',
  '    "@acme/core": "^1.0.0",',
  '    "left-pad": "^1.3.0"',
  '  },',
  '  "peerDependencies": {',
  '    "@acme/ui": "workspace:*"',
  '  },',
  '  "custom": { "keep": true }',
  '}',
  ''
].join('\n');

describe('JsonManifestProvider.parse', () => {
  it('reads name, version and every dependency section', () => {
    const data = provider.parse(MANIFEST, '/repo/app/package.json');
    assert.equal(data.name, '@acme/app');
    assert.equal(data.version, '1.0.0');
    assert.equal(data.private, false);
    assert.equal(data.workspaces, undefined);
    assert.deepEqual(data.dependencies, {
      runtime: { '@acme/core': '^1.0.0', 'left-pad': '^1.3.0' },
      development: {},
      peer: { '@acme/ui': 'workspace:*' },
      optional: {}
    });
  });

  it('unwraps the object form of workspaces', () => {
    const data = provider.parse('{"private": true, "workspaces": {"packages": ["packages/*"]}}', '/repo/package.json');
    assert.deepEqual(data.workspaces, ['packages/*']);
    assert.equal(data.private, true);
  });

  it('rejects malformed manifests', () => {
    assert.throws(() => provider.parse('{"name": ', '/repo/package.json'), WorkspaceError);
    assert.throws(
      () => provider.parse('{"dependencies": {"a": 1}}', '/repo/package.json'),
      /Malformed manifest \/repo\/package.json: "dependencies.a" must be a string/
    );
    assert.throws(() => provider.parse('[]', '/repo/package.json'), /expected a JSON object/);
  });
});

describe('JsonManifestProvider.update', () => {
  it('replaces values in place and keeps everything else', () => {
    const updated = provider.update(MANIFEST, [
      { path: ['version'], value: '2.0.0' },
      { path: ['dependencies', '@acme/core'], value: '^2.0.0' }
    ]);
    assert.equal(
      updated,
      MANIFEST.replace('"version": "1.0.0"', '"version": "2.0.0"').replace('"@acme/core": "^1.0.0"', '"@acme/core": "^2.0.0"')
    );
  });
});
