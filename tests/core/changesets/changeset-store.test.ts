import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ChangesetStore } from '../../../src/core/changesets/changeset-store.js';
import { ChangesetIdGenerator, isChangesetId } from '../../../src/core/changesets/changeset-id.js';
import { resolveEngineConfig } from '../../../src/core/config.js';
import type { MemoryFileProvider } from '../../../src/core/ports/memory-file-provider.js';
import { ErrorCodes, MonoversionError, type EngineConfigInput, type Workspace } from '../../../src/types/index.js';
import { CancelledError } from '../../../src/utils/errors.js';
import { FIXED_NOW, ROOT, loadWorkspace, memoryWorkspace, quietLogger, sequentialIds } from '../../fixtures.js';

interface Setup {
  files: MemoryFileProvider;
  workspace: Workspace;
  store: ChangesetStore;
}

async function setup(config: EngineConfigInput = {}, signal?: AbortSignal): Promise<Setup> {
  const files = memoryWorkspace({
    'packages/core': { name: 'core', version: '1.0.0' },
    'packages/ui': { name: 'ui', version: '1.0.0' }
  });
  const { workspace } = await loadWorkspace(files);
  const store = new ChangesetStore({
    root: ROOT,
    files,
    config: resolveEngineConfig(config),
    ids: sequentialIds(),
    now: () => FIXED_NOW,
    logger: quietLogger,
    signal
  });
  return { files, workspace, store };
}

function hasCode(code: ErrorCodes): (error: unknown) => boolean {
  return error => error instanceof MonoversionError && error.code === code;
}

const FIRST_ID = '000000001-0000-000001';
const SECOND_ID = '000000001-0001-000002';

describe('ChangesetStore.create', () => {
  it('persists a pending record with defaults', async () => {
    const { files, workspace, store } = await setup();
    const created = await store.create(
      { package: 'core', bump: 'minor', description: '  Add retries  ', author: 'test-user' },
      workspace
    );
    assert.deepEqual(created, {
      id: FIRST_ID,
      package: 'core',
      bump: 'minor',
      description: 'Add retries',
      author: 'test-user',
      createdAt: '2026-03-01T12:00:00.000Z',
      environments: ['staging', 'production'],
      status: 'pending',
      productionDeployment: true
    });
    assert.equal(await files.exists(`${ROOT}/.changesets/${FIRST_ID}.yaml`), true);
    assert.equal(await files.exists(`${ROOT}/.changesets/.lock`), false);
    assert.deepEqual(await store.get(FIRST_ID), created);
  });

  it('derives the production flag from the environments', async () => {
    const { workspace, store } = await setup();
    const created = await store.create(
      { package: 'ui', bump: 'patch', description: 'Fix', author: 'test-user', environments: ['staging'] },
      workspace
    );
    assert.equal(created.productionDeployment, false);
  });

  it('writes JSON records when configured', async () => {
    const { files, workspace, store } = await setup({ changesetFormat: 'json', changesetDir: '.release/changes' });
    await store.create({ package: 'ui', bump: 'patch', description: 'Fix', author: 'test-user' }, workspace);
    assert.equal(await files.exists(`${ROOT}/.release/changes/${FIRST_ID}.json`), true);
  });

  it('rejects invalid input', async () => {
    const { workspace, store } = await setup();
    await assert.rejects(
      store.create({ package: 'nope', bump: 'patch', description: 'x', author: 'test-user' }, workspace),
      (error: unknown) =>
        error instanceof MonoversionError &&
        error.code === ErrorCodes.INVALID_CHANGESET &&
        error.message === 'Invalid changeset: package "nope" is not a workspace member'
    );
    await assert.rejects(
      store.create({ package: 'core', bump: 'patch', description: '   ', author: 'test-user' }, workspace),
      /description must not be empty/
    );
    await assert.rejects(
      store.create({ package: 'core', bump: 'patch', description: 'x', author: '' }, workspace),
      /author must not be empty/
    );
  });

  it('stops when cancelled', async () => {
    const controller = new AbortController();
    const { files, workspace, store } = await setup({}, controller.signal);
    controller.abort();
    await assert.rejects(
      store.create({ package: 'core', bump: 'patch', description: 'x', author: 'test-user' }, workspace),
      CancelledError
    );
    assert.deepEqual(await files.listFiles(`${ROOT}/.changesets`), []);
  });
});

describe('ChangesetStore queries and transitions', () => {
  it('lists records in id order with filters', async () => {
    const { workspace, store } = await setup();
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'ana', environments: ['staging'] }, workspace);
    await store.create({ package: 'core', bump: 'major', description: 'B', author: 'bo' }, workspace);

    assert.deepEqual((await store.list()).map(changeset => changeset.id), [FIRST_ID, SECOND_ID]);
    assert.deepEqual((await store.list({ package: 'core' })).map(changeset => changeset.id), [SECOND_ID]);
    assert.deepEqual((await store.list({ environment: 'production' })).map(changeset => changeset.id), [SECOND_ID]);
    assert.deepEqual((await store.list({ author: 'ana' })).map(changeset => changeset.id), [FIRST_ID]);
  });

  it('moves pending records to applied or discarded once', async () => {
    const { workspace, store } = await setup();
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);
    await store.create({ package: 'core', bump: 'patch', description: 'B', author: 'test-user' }, workspace);

    assert.equal((await store.markApplied(FIRST_ID)).status, 'applied');
    assert.equal((await store.discard(SECOND_ID)).status, 'discarded');
    assert.deepEqual(await store.pending(), []);
    await assert.rejects(store.markApplied(FIRST_ID), hasCode(ErrorCodes.INVALID_TRANSITION));
    await assert.rejects(store.discard('000000009-0000-ffffff'), hasCode(ErrorCodes.CHANGESET_NOT_FOUND));
  });

  it('compacts discarded and applied records', async () => {
    const { files, workspace, store } = await setup();
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);
    await store.create({ package: 'core', bump: 'patch', description: 'B', author: 'test-user' }, workspace);
    await store.markApplied(FIRST_ID);
    await store.discard(SECOND_ID);

    assert.deepEqual(await store.compact(), { removed: [SECOND_ID], archived: [FIRST_ID] });
    assert.deepEqual(await store.list(), []);
    assert.deepEqual((await store.history()).map(changeset => [changeset.id, changeset.status]), [[FIRST_ID, 'applied']]);
    assert.deepEqual(await files.listFiles(`${ROOT}/.changesets/history`), [`${FIRST_ID}.yaml`]);
  });

  it('rejects records whose id does not match the file name', async () => {
    const { files, workspace, store } = await setup();
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);
    await files.rename(`${ROOT}/.changesets/${FIRST_ID}.yaml`, `${ROOT}/.changesets/renamed.yaml`);
    await assert.rejects(store.list(), hasCode(ErrorCodes.INVALID_CHANGESET));
  });
});

describe('ChangesetStore locking', () => {
  it('refuses to write while another process holds a fresh lock', async () => {
    const { files, workspace, store } = await setup();
    files.setFile(`${ROOT}/.changesets/.lock`, JSON.stringify({ pid: 4242, acquiredAt: '2026-03-01T11:59:50.000Z' }));
    await assert.rejects(
      store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace),
      (error: unknown) =>
        error instanceof MonoversionError &&
        error.code === ErrorCodes.STORE_LOCKED &&
        error.message === 'Changeset store is locked by process 4242'
    );
    assert.equal(await files.exists(`${ROOT}/.changesets/.lock`), true);
  });

  it('takes over a stale lock', async () => {
    const { files, workspace, store } = await setup();
    files.setFile(`${ROOT}/.changesets/.lock`, JSON.stringify({ pid: 4242, acquiredAt: '2026-03-01T11:58:00.000Z' }));
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);
    assert.equal(await files.exists(`${ROOT}/.changesets/.lock`), false);
    assert.equal((await store.pending()).length, 1);
  });

  it('takes over an unreadable lock', async () => {
    const { files, workspace, store } = await setup();
    files.setFile(`${ROOT}/.changesets/.lock`, 'garbage');
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);
    assert.equal((await store.pending()).length, 1);
  });

  it('holds the lock across nested store calls and releases it afterwards', async () => {
    const { files, workspace, store } = await setup();
    await store.create({ package: 'ui', bump: 'patch', description: 'A', author: 'test-user' }, workspace);

    const applied = await store.withLock(async () => {
      assert.equal(await files.exists(`${ROOT}/.changesets/.lock`), true);
      return store.markApplied(FIRST_ID);
    });

    assert.equal(applied.status, 'applied');
    assert.equal(await files.exists(`${ROOT}/.changesets/.lock`), false);
  });
});

describe('ChangesetIdGenerator', () => {
  it('orders ids within the same millisecond and after the clock steps back', () => {
    const times = [5000, 5000, 4000, 6000];
    const generator = new ChangesetIdGenerator({ clock: () => times.shift() ?? 0, random: () => 'abcdef' });
    const ids = [generator.next(), generator.next(), generator.next(), generator.next()];
    assert.deepEqual(ids, [
      '0000003uw-0000-abcdef',
      '0000003uw-0001-abcdef',
      '0000003uw-0002-abcdef',
      '0000004mo-0000-abcdef'
    ]);
    assert.deepEqual([...ids].sort(), ids);
    assert.ok(ids.every(isChangesetId));
  });
});
