import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ErrorCodes, MonoversionError } from '../../src/types/index.js';
import {
  CancelledError,
  ChangesetError,
  ConfigError,
  EXIT_CODES,
  FileSystemError,
  GraphError,
  PlanningError,
  ValidationError,
  WorkspaceError,
  causeChain,
  exitCodeFor,
  handleError,
  toDiagnostics
} from '../../src/utils/errors.js';

describe('error hierarchy', () => {
  it('every subclass is a MonoversionError with its kind', () => {
    const error = new WorkspaceError('bad manifest', ErrorCodes.MANIFEST_PARSE);
    assert.ok(error instanceof MonoversionError);
    assert.equal(error.kind, 'workspace');
    assert.equal(error.code, 'MANIFEST_PARSE');
    assert.equal(error.name, 'WorkspaceError');
  });

  it('file system errors are provider errors with a prefixed message', () => {
    const error = new FileSystemError('disk full');
    assert.equal(error.kind, 'provider');
    assert.equal(error.code, ErrorCodes.FILE_SYSTEM_ERROR);
    assert.equal(error.message, 'File system error: disk full');
  });

  it('keeps the cause chain', () => {
    const root = new Error('EACCES');
    const error = new ChangesetError('write failed', ErrorCodes.STORE_WRITE_FAILED, undefined, root);
    assert.deepEqual(causeChain(error), ['write failed', 'EACCES']);
  });
});

describe('exitCodeFor', () => {
  it('maps kinds to process exit codes', () => {
    assert.equal(exitCodeFor(new ConfigError('x')), EXIT_CODES.CONFIGURATION);
    assert.equal(exitCodeFor(new PlanningError([])), EXIT_CODES.CONFLICT);
    assert.equal(exitCodeFor(new ValidationError([])), EXIT_CODES.VALIDATION);
    assert.equal(exitCodeFor(new GraphError('x')), EXIT_CODES.VALIDATION);
    assert.equal(exitCodeFor(new CancelledError()), 130);
    assert.equal(exitCodeFor(new FileSystemError('x')), EXIT_CODES.PROVIDER);
    assert.equal(exitCodeFor(new Error('plain')), EXIT_CODES.PROVIDER);
  });

  it('treats store contention as a provider failure', () => {
    assert.equal(exitCodeFor(new ChangesetError('locked', ErrorCodes.STORE_LOCKED)), EXIT_CODES.PROVIDER);
    assert.equal(exitCodeFor(new ChangesetError('missing', ErrorCodes.CHANGESET_NOT_FOUND)), EXIT_CODES.VALIDATION);
  });
});

describe('toDiagnostics', () => {
  it('lists every planning conflict', () => {
    const error = new PlanningError([
      { kind: 'MIXED_SNAPSHOT', message: 'a mixes snapshot', packages: ['a'] },
      { kind: 'CYCLE_PREVENTS_ORDERING', message: 'cycle', packages: ['b', 'c'] }
    ]);
    assert.equal(error.message, 'Cannot build version plan: a mixes snapshot (and 1 more)');
    assert.deepEqual(toDiagnostics(error), [
      { severity: 'error', category: 'MIXED_SNAPSHOT', message: 'a mixes snapshot', packages: ['a'] },
      { severity: 'error', category: 'CYCLE_PREVENTS_ORDERING', message: 'cycle', packages: ['b', 'c'] }
    ]);
  });

  it('collects package names from error details', () => {
    const error = new WorkspaceError('duplicate', ErrorCodes.DUPLICATE_PACKAGE_NAME, {
      packageName: 'zeta',
      packages: ['alpha', 'zeta']
    });
    assert.deepEqual(toDiagnostics(error), [
      { severity: 'error', category: 'DUPLICATE_PACKAGE_NAME', message: 'duplicate', packages: ['alpha', 'zeta'] }
    ]);
  });

  it('wraps unexpected values', () => {
    assert.deepEqual(toDiagnostics('boom'), [
      { severity: 'error', category: 'UNEXPECTED', message: 'boom', packages: [] }
    ]);
  });
});

describe('handleError', () => {
  it('returns a failed command result with the exit code', () => {
    const result = handleError(new ConfigError('bad option'));
    assert.deepEqual(result, { success: false, error: 'bad option', exitCode: 2 });
  });
});
