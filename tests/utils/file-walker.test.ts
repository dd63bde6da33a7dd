import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { collectEntries } from '../../src/utils/file-walker.js';

let root: string;

before(async () => {
  root = await fs.mkdtemp(join(tmpdir(), 'monoversion-walker-'));
  await fs.mkdir(join(root, 'a', 'b'), { recursive: true });
  await fs.mkdir(join(root, 'node_modules'), { recursive: true });
  await fs.writeFile(join(root, 'a', 'x.txt'), 'x');
  await fs.writeFile(join(root, 'a', 'b', 'y.txt'), 'y');
  await fs.writeFile(join(root, 'c.txt'), 'c');
  await fs.writeFile(join(root, 'node_modules', 'z.txt'), 'z');
});

after(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('collectEntries', () => {
  it('walks depth-first in lexicographic order and skips ignored directories', async () => {
    const entries = await collectEntries(root);
    assert.deepEqual(entries.map(entry => entry.path), ['a', 'a/b', 'a/b/y.txt', 'a/x.txt', 'c.txt']);
    assert.deepEqual(entries[0], { path: 'a', isDirectory: true, isSymlink: false });
  });

  it('yields only directories when asked', async () => {
    const entries = await collectEntries(root, { directoriesOnly: true });
    assert.deepEqual(entries.map(entry => entry.path), ['a', 'a/b']);
  });

  it('stops at the maximum depth', async () => {
    const entries = await collectEntries(root, { maxDepth: 1 });
    assert.deepEqual(entries.map(entry => entry.path), ['a', 'c.txt']);
  });

  it('prunes a filtered directory together with its subtree', async () => {
    const entries = await collectEntries(root, { filter: entry => entry.path !== 'a' });
    assert.deepEqual(entries.map(entry => entry.path), ['c.txt']);
  });

  it('enters ignored names when the list is overridden', async () => {
    const entries = await collectEntries(root, { ignoreNames: [], directoriesOnly: true });
    assert.deepEqual(entries.map(entry => entry.path), ['a', 'a/b', 'node_modules']);
  });
});
