import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import semver from 'semver';

import { GraphBuilder } from '../../../src/core/graph/graph-builder.js';
import { VersionPlanner, propagatedBump, type PlanOptions } from '../../../src/core/planning/version-planner.js';
import { resolveEngineConfig } from '../../../src/core/config.js';
import {
  ErrorCodes,
  MonoversionError,
  type BumpKind,
  type ChangeAttribution,
  type Changeset,
  type EngineConfigInput,
  type VersionPlan,
  type Workspace,
  type WorkspacePackage
} from '../../../src/types/index.js';
import { ConfigError, PlanningError } from '../../../src/utils/errors.js';
import { FIXED_NOW, ROOT, quietLogger, workspacePackage } from '../../fixtures.js';

function changeset(id: string, pkg: string, bump: BumpKind, status: Changeset['status'] = 'pending'): Changeset {
  return {
    id,
    package: pkg,
    bump,
    description: `${bump} change`,
    author: 'test-user',
    createdAt: FIXED_NOW.toISOString(),
    environments: ['production'],
    status,
    productionDeployment: true
  };
}

function plan(
  packages: WorkspacePackage[],
  options: PlanOptions,
  config: EngineConfigInput = {}
): VersionPlan {
  const workspace: Workspace = {
    root: ROOT,
    rootManifestPath: `${ROOT}/package.json`,
    patterns: [],
    excludes: [],
    packages: [...packages].sort((a, b) => a.name.localeCompare(b.name)),
    declaredDependencyNames: [],
    orphans: []
  };
  const graph = new GraphBuilder({ logger: quietLogger }).build(workspace.packages);
  const planner = new VersionPlanner({ config: resolveEngineConfig(config), logger: quietLogger });
  return planner.plan(workspace, graph, { now: FIXED_NOW, ...options });
}

function versionEdit(pkg: string, from: string, to: string) {
  return { package: pkg, manifestPath: `${ROOT}/packages/${pkg}/package.json`, field: 'version', from, to };
}

function conflictsOf(run: () => unknown): PlanningError {
  try {
    run();
  } catch (error) {
    if (error instanceof PlanningError) return error;
    throw error;
  }
  assert.fail('expected a PlanningError');
}

const chain = (range = '^1.0.0'): WorkspacePackage[] => [
  workspacePackage('a', '1.0.0', [['b', range]]),
  workspacePackage('b', '1.0.0')
];

describe('VersionPlanner', () => {
  it('propagates a compatible patch as a patch', () => {
    const result = plan(chain(), { changesets: [changeset('c1', 'b', 'patch')] });
    assert.deepEqual(result, {
      changesets: ['c1'],
      steps: [
        {
          package: 'b',
          currentVersion: '1.0.0',
          newVersion: '1.0.1',
          bump: 'patch',
          reasons: [{ type: 'changeset', source: 'c1' }],
          edits: [versionEdit('b', '1.0.0', '1.0.1')]
        },
        {
          package: 'a',
          currentVersion: '1.0.0',
          newVersion: '1.0.1',
          bump: 'patch',
          reasons: [{ type: 'propagation', source: 'b' }],
          edits: [versionEdit('a', '1.0.0', '1.0.1')]
        }
      ]
    });
  });

  it('propagates a breaking bump and widens the consumer range', () => {
    const result = plan(chain(), { changesets: [changeset('c1', 'b', 'major')] });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.bump]),
      [['b', '2.0.0', 'major'], ['a', '2.0.0', 'major']]
    );
    assert.deepEqual(result.steps[0]?.edits, [
      versionEdit('b', '1.0.0', '2.0.0'),
      {
        package: 'a',
        manifestPath: `${ROOT}/packages/a/package.json`,
        field: 'dependencies',
        dependency: 'b',
        from: '^1.0.0',
        to: '^2.0.0'
      }
    ]);
  });

  it('keeps consumers at patch under the conservative policy', () => {
    const result = plan(chain(), {
      changesets: [changeset('c1', 'b', 'major')],
      strategy: { propagation: 'conservative' }
    });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion]),
      [['b', '2.0.0'], ['a', '1.0.1']]
    );
    assert.equal(result.steps[0]?.edits[1]?.to, '^2.0.0');
  });

  it('merges several changesets for one package into the highest bump', () => {
    const result = plan([workspacePackage('a', '1.2.3')], {
      changesets: [changeset('c3', 'a', 'patch'), changeset('c1', 'a', 'patch'), changeset('c2', 'a', 'minor')]
    });
    assert.equal(result.steps.length, 1);
    assert.equal(result.steps[0]?.newVersion, '1.3.0');
    assert.equal(result.steps[0]?.bump, 'minor');
    assert.deepEqual(result.steps[0]?.reasons, [
      { type: 'changeset', source: 'c1' },
      { type: 'changeset', source: 'c2' },
      { type: 'changeset', source: 'c3' }
    ]);
    assert.deepEqual(result.changesets, ['c1', 'c2', 'c3']);
  });

  it('rejects a snapshot mixed with a release bump', () => {
    const error = conflictsOf(() =>
      plan([workspacePackage('a', '1.0.0')], {
        changesets: [changeset('c1', 'a', 'patch'), changeset('c2', 'a', 'snapshot')]
      })
    );
    assert.equal(error.code, ErrorCodes.PLAN_CONFLICT);
    assert.deepEqual(error.conflicts, [
      { kind: 'MIXED_SNAPSHOT', message: 'a has both snapshot and patch changesets', packages: ['a'] }
    ]);
  });

  it('refuses to order a plan that touches a cycle', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0']]), workspacePackage('b', '1.0.0', [['a', '^1.0.0']])];
    const error = conflictsOf(() => plan(packages, { changesets: [changeset('c1', 'a', 'patch')] }));
    assert.deepEqual(error.conflicts, [
      {
        kind: 'CYCLE_PREVENTS_ORDERING',
        message: 'Dependency cycle a -> b -> a prevents ordering',
        packages: ['a', 'b']
      }
    ]);
  });

  it('collects every conflict when asked', () => {
    const packages = [
      workspacePackage('p', '1.0.0', [['q', '^1.0.0']]),
      workspacePackage('q', '1.0.0', [['p', '^1.0.0']]),
      workspacePackage('x', '1.0.0')
    ];
    const error = conflictsOf(() =>
      plan(packages, {
        changesets: [changeset('c1', 'x', 'patch'), changeset('c2', 'x', 'snapshot'), changeset('c3', 'p', 'patch')],
        conflictMode: 'collectAll'
      })
    );
    assert.deepEqual(error.conflicts.map(conflict => [conflict.kind, conflict.packages]), [
      ['MIXED_SNAPSHOT', ['x']],
      ['CYCLE_PREVENTS_ORDERING', ['p', 'q']]
    ]);
    assert.equal(error.message, 'Cannot build version plan: x has both snapshot and patch changesets (and 1 more)');
  });

  it('reports ranges that cannot be widened', () => {
    const error = conflictsOf(() => plan(chain('>=1.0.0 <2.0.0'), { changesets: [changeset('c1', 'b', 'major')] }));
    assert.deepEqual(error.conflicts, [
      {
        kind: 'INCOMPATIBLE_RANGE',
        message: 'a declares b@>=1.0.0 <2.0.0, which cannot be widened to admit 2.0.0',
        packages: ['a', 'b']
      }
    ]);
  });

  it('renders snapshot versions and widens consumers to them', () => {
    const packages = [workspacePackage('a', '1.2.3'), workspacePackage('c', '1.0.0', [['a', '^1.2.3']])];
    const result = plan(packages, { changesets: [changeset('c1', 'a', 'snapshot')], sha: 'abc123def4567890' });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.bump]),
      [
        ['a', '1.2.4-snapshot.abc123def4567890', 'snapshot'],
        ['c', '1.0.1-snapshot.abc123def4567890', 'snapshot']
      ]
    );
    assert.equal(result.steps[0]?.edits[1]?.to, '^1.2.4-snapshot.abc123def4567890');
  });

  it('gives consumers a patch release for a snapshot under the conservative policy', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0']]), workspacePackage('b', '1.0.0')];
    const result = plan(packages, {
      changesets: [changeset('c1', 'b', 'snapshot')],
      strategy: { propagation: 'conservative' },
      sha: 'abc123def4567890'
    });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.bump]),
      [
        ['b', '1.0.1-snapshot.abc123def4567890', 'snapshot'],
        ['a', '1.0.1', 'patch']
      ]
    );
    assert.deepEqual(
      result.steps[0]?.edits.slice(1).map(edit => [edit.package, edit.from, edit.to]),
      [['a', '^1.0.0', '^1.0.1-snapshot.abc123def4567890']]
    );
  });

  it('keeps a release changeset when a dependency ships a snapshot', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0']]), workspacePackage('b', '1.0.0')];
    const result = plan(packages, {
      changesets: [changeset('c1', 'a', 'patch'), changeset('c2', 'b', 'snapshot')],
      sha: 'abc123def4567890'
    });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.bump]),
      [
        ['b', '1.0.1-snapshot.abc123def4567890', 'snapshot'],
        ['a', '1.0.1', 'patch']
      ]
    );
  });

  it('keeps a snapshot changeset when a dependency ships a release', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0']]), workspacePackage('b', '1.0.0')];
    const result = plan(packages, {
      changesets: [changeset('c1', 'a', 'snapshot'), changeset('c2', 'b', 'major')],
      strategy: { propagation: 'aggressive' },
      sha: 'abc123def4567890'
    });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.bump]),
      [
        ['b', '2.0.0', 'major'],
        ['a', '1.0.1-snapshot.abc123def4567890', 'snapshot']
      ]
    );
  });

  it('uses the clock for timestamp snapshots', () => {
    const result = plan(
      [workspacePackage('a', '0.4.0')],
      { changesets: [changeset('c1', 'a', 'snapshot')] },
      { snapshotTemplate: '{version}-snap.{timestamp}' }
    );
    assert.equal(result.steps[0]?.newVersion, '0.4.1-snap.1772366400');
  });

  it('requires a revision for sha snapshots', () => {
    assert.throws(
      () => plan([workspacePackage('a', '1.0.0')], { changesets: [changeset('c1', 'a', 'snapshot')] }),
      (error: unknown) => error instanceof ConfigError && /no revision identifier/.test(error.message)
    );
  });

  it('pulls consumers in when only their range needs an edit', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0', 'development']]), workspacePackage('b', '1.0.0')];
    const result = plan(packages, {
      changesets: [changeset('c1', 'b', 'major')],
      strategy: { propagateKinds: ['runtime'] }
    });
    assert.deepEqual(
      result.steps.map(step => [step.package, step.newVersion, step.reasons]),
      [
        ['b', '2.0.0', [{ type: 'changeset', source: 'c1' }]],
        ['a', '1.0.1', [{ type: 'range', source: 'b' }]]
      ]
    );
    assert.equal(result.steps[0]?.edits[1]?.field, 'devDependencies');
  });

  it('always propagates along peer edges', () => {
    const packages = [workspacePackage('a', '1.0.0', [['b', '^1.0.0', 'peer']]), workspacePackage('b', '1.0.0')];
    const result = plan(packages, {
      changesets: [changeset('c1', 'b', 'patch')],
      strategy: { propagateKinds: [] }
    });
    assert.deepEqual(result.steps.map(step => step.package), ['b', 'a']);
  });

  it('seeds affected packages with the default bump up to their suggestion', () => {
    const attribution = (suggestion: BumpKind): ChangeAttribution => ({
      directlyAffected: ['b'],
      transitivelyAffected: ['a', 'b'],
      rootLevelChanges: [],
      packages: [{ package: 'b', files: [{ path: 'packages/b/README.md', category: 'documentation' }], significance: 1, maxBumpSuggestion: suggestion }]
    });

    const seeded = plan(chain(), { changesets: [], attribution: attribution('major') }, { defaultBump: 'minor' });
    assert.deepEqual(
      seeded.steps.map(step => [step.package, step.newVersion, step.reasons]),
      [
        ['b', '1.1.0', [{ type: 'affected' }]],
        ['a', '1.0.1', [{ type: 'propagation', source: 'b' }]]
      ]
    );

    const capped = plan(chain(), { changesets: [], attribution: attribution('none') });
    assert.deepEqual(capped, { steps: [], changesets: [] });
  });

  it('ignores changesets that are no longer pending', () => {
    const result = plan(chain(), { changesets: [changeset('c1', 'b', 'major', 'applied')] });
    assert.deepEqual(result, { steps: [], changesets: [] });
  });

  it('rejects changesets for unknown packages', () => {
    assert.throws(
      () => plan(chain(), { changesets: [changeset('c1', 'ghost', 'patch')] }),
      (error: unknown) => error instanceof MonoversionError && error.code === ErrorCodes.INVALID_CHANGESET
    );
  });

  it('produces the same plan regardless of changeset order', () => {
    const packages = [
      workspacePackage('app', '3.1.0', [['ui', '^2.0.0'], ['core', '~1.4.0']]),
      workspacePackage('ui', '2.0.0', [['core', '^1.4.0']]),
      workspacePackage('core', '1.4.2')
    ];
    const changesets = [changeset('c1', 'core', 'minor'), changeset('c2', 'ui', 'patch'), changeset('c3', 'core', 'patch')];
    const first = plan(packages, { changesets });
    const second = plan(packages, { changesets: [...changesets].reverse() });
    assert.deepEqual(first, second);

    assert.deepEqual(first.steps.map(step => step.package), ['core', 'ui', 'app']);
    for (const step of first.steps) {
      assert.ok(semver.gt(step.newVersion, step.currentVersion), `${step.package} moves forward`);
    }
    // ~1.4.0 cannot admit 1.5.0, so app takes a minor and its range is widened
    assert.deepEqual(
      first.steps.map(step => [step.package, step.newVersion]),
      [['core', '1.5.0'], ['ui', '2.0.1'], ['app', '3.2.0']]
    );
    assert.deepEqual(first.steps[0]?.edits.slice(1).map(edit => [edit.package, edit.from, edit.to]), [['app', '~1.4.0', '~1.5.0']]);
  });
});

describe('propagatedBump', () => {
  it('follows the policy', () => {
    assert.equal(propagatedBump('default', 'minor', '1.0.0', '^1.0.0'), 'patch');
    assert.equal(propagatedBump('default', 'minor', '1.0.0', '~1.0.0'), 'minor');
    assert.equal(propagatedBump('default', 'minor', '0.3.0', '^0.3.0'), 'major');
    assert.equal(propagatedBump('conservative', 'major', '1.0.0', '^1.0.0'), 'patch');
    assert.equal(propagatedBump('aggressive', 'minor', '1.0.0', '^1.0.0'), 'minor');
    assert.equal(propagatedBump('aggressive', 'snapshot', '1.0.0', '^1.0.0'), 'snapshot');
    assert.equal(propagatedBump('aggressive', 'none', '1.0.0', '^1.0.0'), 'none');
  });

  it('gives a patch for any dependency bump under the conservative policy', () => {
    assert.equal(propagatedBump('conservative', 'snapshot', '1.0.0', '^1.0.0'), 'patch');
    assert.equal(propagatedBump('default', 'snapshot', '1.0.0', '^1.0.0'), 'snapshot');
    assert.equal(propagatedBump('conservative', 'none', '1.0.0', '^1.0.0'), 'none');
  });
});
