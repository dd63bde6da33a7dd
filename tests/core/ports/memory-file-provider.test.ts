import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MemoryFileProvider } from '../../../src/core/ports/memory-file-provider.js';
import { FileSystemError } from '../../../src/utils/errors.js';

function fixture(): MemoryFileProvider {
  return new MemoryFileProvider({
    '/repo/package.json': '{}',
    '/repo/packages/a/package.json': '{"name":"a"}',
    '/repo/packages/a/src/index.ts': '',
    '/repo/node_modules/x/package.json': '{}'
  });
}

describe('MemoryFileProvider', () => {
  it('reads seeded files and creates parent directories', async () => {
    const files = fixture();
    assert.equal(await files.readText('/repo/packages/a/package.json'), '{"name":"a"}');
    assert.equal(await files.isDirectory('/repo/packages'), true);
    assert.equal(await files.exists('/repo/packages/b'), false);
    await assert.rejects(files.readText('/repo/missing.json'), FileSystemError);
  });

  it('walks like the disk walker', async () => {
    const entries = await fixture().walk('/repo');
    assert.deepEqual(entries.map(entry => entry.path), [
      'package.json',
      'packages',
      'packages/a',
      'packages/a/package.json',
      'packages/a/src',
      'packages/a/src/index.ts'
    ]);
    const dirs = await fixture().walk('/repo', { directoriesOnly: true, maxDepth: 2 });
    assert.deepEqual(dirs.map(entry => entry.path), ['packages', 'packages/a']);
  });

  it('lists only files of a directory', async () => {
    const files = fixture();
    assert.deepEqual(await files.listFiles('/repo/packages/a'), ['package.json']);
    assert.deepEqual(await files.listFiles('/repo/nowhere'), []);
  });

  it('creates a file exclusively once', async () => {
    const files = fixture();
    assert.equal(await files.createExclusive('/repo/.lock', '1'), true);
    assert.equal(await files.createExclusive('/repo/.lock', '2'), false);
    assert.equal(await files.readText('/repo/.lock'), '1');
  });

  it('renames and removes subtrees', async () => {
    const files = fixture();
    await files.rename('/repo/packages/a/src/index.ts', '/repo/archive/index.ts');
    await files.remove('/repo/packages');
    assert.deepEqual(Object.keys(files.snapshot()), [
      '/repo/archive/index.ts',
      '/repo/node_modules/x/package.json',
      '/repo/package.json'
    ]);
  });
});
