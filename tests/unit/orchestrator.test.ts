import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Repository, StatusRow } from '../../src/config/schema.js';
import { FleetError } from '../../src/core/errors.js';
import { Orchestrator, configureUpstreamIfSafe, resolveResetTarget, type ResetPlan, type SwitchCheck } from '../../src/core/orchestrator.js';
import { FakeGitBackend, FakeRepoGit, makeCheckout, makeWorkspace, removeWorkspaces } from './helpers/fake-git.js';

const LOCAL = '1111111aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
const REMOTE = '2222222bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';
const BASE = '3333333ccccccccccccccccccccccccccccccccc';

const repo = (name: string, extra: Partial<Repository> = {}): Repository => ({
  url: `https://example.com/org/${name}.git`,
  ...extra,
});

const row = (name: string, overrides: Partial<StatusRow> = {}): StatusRow => ({
  repo: name,
  configRef: 'main',
  localBranchRev: 'main/1111111',
  remoteRev: '2222222',
  branchName: 'main',
  localHead: LOCAL,
  remoteHead: REMOTE,
  sync: 'clean',
  isPullable: false,
  hasConflict: false,
  repoDir: `/work/${name}`,
  ...overrides,
});

describe('Orchestrator', () => {
  let workspace: string;
  let backend: FakeGitBackend;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    workspace = makeWorkspace();
    backend = new FakeGitBackend();
    orchestrator = new Orchestrator(backend, { baseDir: workspace, parallel: 4 });
  });

  afterEach(removeWorkspaces);

  // ─── init ─────────────────────────────────────────────────────────

  describe('init', () => {
    it('clones a missing checkout and switches to its branch', async () => {
      const results = await orchestrator.init([repo('alpha', { branch: 'main' })], { depth: 1 });

      const dir = join(workspace, 'alpha');
      expect(backend.clones).toEqual([{ url: 'https://example.com/org/alpha.git', dir, depth: 1 }]);
      expect(existsSync(dir)).toBe(true);
      expect(backend.open(dir).calls).toEqual(['checkout main']);
      expect(results).toEqual([{ repo: 'alpha', status: 'success', message: 'cloned (depth 1), on main' }]);
    });

    it('creates the branch at the revision when both are configured', async () => {
      const git = backend.add(makeCheckout(workspace, 'alpha'), {});
      const results = await orchestrator.init([repo('alpha', { branch: 'release', revision: 'abc1234' })]);

      expect(backend.clones).toEqual([]);
      expect(git.calls).toEqual(['checkout release -B abc1234']);
      expect(results[0]?.message).toBe('already cloned, branch release at abc1234');
    });

    it('detaches at a revision without a branch', async () => {
      const git = backend.add(makeCheckout(workspace, 'alpha'), {});
      const results = await orchestrator.init([repo('alpha', { revision: 'abc1234' })]);

      expect(git.calls).toEqual(['checkout abc1234']);
      expect(results[0]?.message).toBe('already cloned, detached at abc1234');
    });

    it('leaves the checkout alone when no ref is configured', async () => {
      const results = await orchestrator.init([repo('alpha')]);
      expect(results[0]).toEqual({ repo: 'alpha', status: 'success', message: 'cloned' });
    });

    it('reports failures per repository', async () => {
      backend.add(makeCheckout(workspace, 'beta'), { failCheckout: true });
      backend.failClone = 'repository not found';

      const results = await orchestrator.init([repo('alpha'), repo('beta', { branch: 'main' })]);
      expect(results).toEqual([
        { repo: 'alpha', status: 'error', message: 'repository not found' },
        { repo: 'beta', status: 'error', message: "pathspec 'main' did not match" },
      ]);
    });
  });

  // ─── sync ─────────────────────────────────────────────────────────

  describe('planSync', () => {
    it('separates conflicts, pullable rows and rows without a remote branch', () => {
      const rows = [
        row('a', { isPullable: true }),
        row('b', { isPullable: true, hasConflict: true }),
        row('c', { remoteRev: '', remoteHead: '', sync: 'unpushed' }),
        row('d'),
      ];
      const plan = Orchestrator.planSync(rows);
      expect(plan.conflicts.map((r) => r.repo)).toEqual(['b']);
      expect(plan.pullable.map((r) => r.repo)).toEqual(['a', 'b']);
      expect(plan.skipped.map((r) => r.repo)).toEqual(['c']);
      expect(plan.needsStrategy).toBe(false);
    });

    it('asks for a strategy when a pullable row also has unpushed commits', () => {
      const plan = Orchestrator.planSync([row('a', { isPullable: true, sync: 'unpushed' })]);
      expect(plan.needsStrategy).toBe(true);
    });

    it('never skips detached or unreadable checkouts', () => {
      const plan = Orchestrator.planSync([
        row('e', { branchName: 'HEAD', remoteHead: '', remoteRev: '' }),
        row('f', { branchName: '', remoteHead: '', remoteRev: '' }),
      ]);
      expect(plan.skipped).toEqual([]);
    });

    it('ignores unpushed rows that are not pullable when choosing a strategy', () => {
      const plan = Orchestrator.planSync([row('a', { isPullable: true }), row('b', { sync: 'unpushed' })]);
      expect(plan.needsStrategy).toBe(false);
    });
  });

  describe('pullAll', () => {
    it('pulls in order and stops at the first failure', async () => {
      const a = backend.add('/work/a', {});
      const b = backend.add('/work/b', { failPull: 'Merge conflict in README' });
      const c = backend.add('/work/c', {});

      const results = await orchestrator.pullAll([row('a'), row('b'), row('c')], 'rebase');
      expect(results).toEqual([
        { repo: 'a', status: 'success', message: 'Pulled main' },
        { repo: 'b', status: 'error', message: 'Merge conflict in README' },
      ]);
      expect(a.calls).toEqual(['pull rebase']);
      expect(b.calls).toEqual(['pull rebase']);
      expect(c.calls).toEqual([]);
    });
  });

  // ─── push ─────────────────────────────────────────────────────────

  describe('planPush', () => {
    it('refuses when any row conflicts', () => {
      const plan = Orchestrator.planPush([row('a', { sync: 'unpushed' }), row('b', { isPullable: true, hasConflict: true })]);
      expect(plan.kind).toBe('conflict');
    });

    it('requires a sync when any row is pullable', () => {
      const plan = Orchestrator.planPush([row('a', { sync: 'unpushed' }), row('b', { isPullable: true })]);
      expect(plan).toEqual({ kind: 'sync-required', rows: [row('b', { isPullable: true })] });
    });

    it('reports nothing to push when every row is clean', () => {
      expect(Orchestrator.planPush([row('a'), row('b')])).toEqual({ kind: 'nothing' });
    });

    it('pushes unpushed rows that are on a branch', () => {
      const plan = Orchestrator.planPush([
        row('a', { sync: 'unpushed' }),
        row('b', { sync: 'unpushed', branchName: 'HEAD' }),
        row('c', { sync: 'unpushed', branchName: '' }),
        row('d'),
      ]);
      expect(plan.kind === 'push' ? plan.rows.map((r) => r.repo) : []).toEqual(['a']);
    });
  });

  describe('pushAll', () => {
    it('pushes each branch and keeps going after a failure', async () => {
      backend.add('/work/a', { failPush: 'rejected' });
      const b = backend.add('/work/b', {});

      const results = await orchestrator.pushAll([row('a'), row('b', { branchName: 'dev' })]);
      expect(results).toEqual([
        { repo: 'a', status: 'error', message: 'rejected' },
        { repo: 'b', status: 'success', message: 'Pushed origin/dev' },
      ]);
      expect(b.calls).toEqual(['push dev']);
    });
  });

  // ─── reset ────────────────────────────────────────────────────────

  describe('planReset', () => {
    it('uses a ref that already resolves locally without fetching', async () => {
      const dir = makeCheckout(workspace, 'alpha');
      const git = backend.add(dir, { branch: 'develop', head: LOCAL, refs: ['main'], mergeBase: BASE });

      const plans = await orchestrator.planReset([repo('alpha', { branch: 'main' })]);
      expect(plans).toEqual([{ name: 'alpha', dir, localBranch: 'develop', target: 'main' }]);
      expect(git.calls).not.toContain('fetch main');
    });

    it('falls back to the remote-tracking ref after fetching', async () => {
      const dir = makeCheckout(workspace, 'alpha');
      const git = backend.add(dir, {
        branch: 'feature', head: LOCAL, mergeBase: BASE, fetchedRefs: { release: ['origin/release'] },
      });

      const plans = await orchestrator.planReset([repo('alpha', { branch: 'feature', 'base-branch': 'release' })]);
      expect(plans[0]?.target).toBe('origin/release');
      expect(git.calls).toContain('fetch release');
    });

    it('fetches everything when the target is not a fetchable ref', async () => {
      const dir = makeCheckout(workspace, 'alpha');
      const git = backend.add(dir, {
        branch: 'main', head: LOCAL, mergeBase: BASE, failFetchRef: true, fetchedRefs: { '*': ['abc1234'] },
      });

      const plans = await orchestrator.planReset([repo('alpha', { branch: 'main', revision: 'abc1234' })]);
      expect(plans[0]?.target).toBe('abc1234');
      expect(git.calls).toEqual(expect.arrayContaining(['fetch abc1234', 'fetch']));
    });

    it('reports a target that cannot be found, with the fetch error', async () => {
      backend.add(makeCheckout(workspace, 'alpha'), { branch: 'main', head: LOCAL, failFetch: true });

      await expect(orchestrator.planReset([repo('alpha', { revision: 'v9' })])).rejects.toThrow(
        "[alpha] Target 'v9' (or 'origin/v9') not found. (fetch failed: couldn't find remote ref HEAD)",
      );
    });

    it('refuses a target with no history in common', async () => {
      backend.add(makeCheckout(workspace, 'alpha'), { branch: 'main', head: LOCAL, refs: ['main'], mergeBase: null });

      await expect(orchestrator.planReset([repo('alpha', { branch: 'main' })])).rejects.toThrow(
        "[alpha] Incompatible history between HEAD and 'main'.",
      );
    });

    it('requires a configured target', async () => {
      makeCheckout(workspace, 'alpha');

      await expect(orchestrator.planReset([repo('alpha')])).rejects.toThrow(
        '[alpha] No target (revision, base-branch, or branch) specified for repository alpha',
      );
    });

    it('requires the checkout to exist', async () => {
      await expect(orchestrator.planReset([repo('ghost', { branch: 'main' })])).rejects.toThrow(
        `[ghost] Repository directory ${join(workspace, 'ghost')} does not exist.`,
      );
    });

    it('labels detached checkouts and sorts plans by name', async () => {
      backend.add(makeCheckout(workspace, 'zeta'), { branch: 'HEAD', head: LOCAL, refs: ['main'], mergeBase: BASE });
      backend.add(makeCheckout(workspace, 'alpha'), { branch: 'main', head: LOCAL, refs: ['main'], mergeBase: BASE });

      const plans = await orchestrator.planReset([repo('zeta', { branch: 'main' }), repo('alpha', { branch: 'main' })]);
      expect(plans.map((p) => [p.name, p.localBranch])).toEqual([['alpha', 'main'], ['zeta', 'HEAD (detached)']]);
    });
  });

  describe('resetAll', () => {
    it('resets in order and stops at the first failure', async () => {
      const a = backend.add('/work/a', {});
      backend.add('/work/b', { failReset: 'unable to write new index file' });
      const c = backend.add('/work/c', {});
      const plans: ResetPlan[] = ['a', 'b', 'c'].map((name) => ({
        name, dir: `/work/${name}`, localBranch: 'main', target: 'origin/main',
      }));

      const results = await orchestrator.resetAll(plans);
      expect(results).toEqual([
        { repo: 'a', status: 'success', message: 'Reset to origin/main' },
        { repo: 'b', status: 'error', message: 'unable to write new index file' },
      ]);
      expect(a.calls).toEqual(['reset origin/main']);
      expect(c.calls).toEqual([]);
    });
  });

  // ─── switch ───────────────────────────────────────────────────────

  describe('precheckSwitch', () => {
    it('finds the branch locally or on origin', async () => {
      const alpha = backend.add(makeCheckout(workspace, 'alpha'), { branch: 'main', refs: ['refs/heads/feature'] });
      backend.add(makeCheckout(workspace, 'beta'), {
        branch: 'dev', fetchedRefs: { feature: ['refs/remotes/origin/feature'] },
      });
      backend.add(makeCheckout(workspace, 'gamma'), { branch: 'main', failFetch: true });

      const checks = await orchestrator.precheckSwitch([repo('alpha'), repo('beta'), repo('gamma'), repo('delta')], 'feature');
      expect(checks.map((c) => [c.name, c.checkoutExists, c.currentBranch, c.hasBranch])).toEqual([
        ['alpha', true, 'main', true],
        ['beta', true, 'dev', true],
        ['gamma', true, 'main', false],
        ['delta', false, null, false],
      ]);
      expect(alpha.calls).not.toContain('fetch feature');
    });
  });

  describe('planSwitch', () => {
    const check = (name: string, overrides: Partial<SwitchCheck> = {}): SwitchCheck => ({
      repo: repo(name),
      name,
      dir: `/work/${name}`,
      checkoutExists: true,
      currentBranch: 'main',
      hasBranch: true,
      ...overrides,
    });

    it('requires every checkout to exist', () => {
      expect(() => Orchestrator.planSwitch([check('a'), check('b', { checkoutExists: false })], 'feature', true))
        .toThrow('Repository directory /work/b does not exist.');
    });

    it('lists repositories missing the branch', () => {
      const run = () => Orchestrator.planSwitch(
        [check('a'), check('b', { hasBranch: false }), check('c', { hasBranch: false })],
        'feature',
        false,
      );
      expect(run).toThrow(FleetError);
      expect(run).toThrow([
        "Branch 'feature' missing in repositories:",
        ' - https://example.com/org/b.git (/work/b)',
        ' - https://example.com/org/c.git (/work/c)',
      ].join('\n'));
    });

    it('plans creation where the branch is missing', () => {
      const plan = Orchestrator.planSwitch([check('a'), check('b', { hasBranch: false })], 'feature', true);
      expect(plan.toCreate.map((c) => c.name)).toEqual(['b']);
      expect(plan.branchesDiffer).toBe(false);
    });

    it('notices differing current branches when creating', () => {
      const checks = [check('a'), check('b', { currentBranch: 'dev' })];
      expect(Orchestrator.planSwitch(checks, 'feature', true).branchesDiffer).toBe(true);
      expect(Orchestrator.planSwitch(checks, 'feature', false).branchesDiffer).toBe(false);
    });
  });

  describe('switchBranch', () => {
    const checkFor = (name: string, dir: string, hasBranch: boolean): SwitchCheck => ({
      repo: repo(name), name, dir, checkoutExists: true, currentBranch: 'main', hasBranch,
    });

    it('switches and tracks an identical remote branch', async () => {
      const git = backend.add('/work/a', {
        head: LOCAL, refs: ['refs/remotes/origin/feature'], revs: { 'refs/remotes/origin/feature': LOCAL },
      });

      const results = await orchestrator.switchBranch([checkFor('a', '/work/a', true)], 'feature');
      expect(results).toEqual([{ repo: 'a', status: 'success', message: 'Switched to feature (tracking origin/feature)' }]);
      expect(git.calls[0]).toBe('checkout feature');
      expect(git.calls).toContain('setUpstream feature');
    });

    it('creates the branch when it is missing and skips tracking without a remote', async () => {
      const git = backend.add('/work/a', { failFetch: true });

      const results = await orchestrator.switchBranch([checkFor('a', '/work/a', false)], 'feature');
      expect(results[0]?.message).toBe('Created feature');
      expect(git.calls[0]).toBe('checkout feature -b');
      expect(git.calls).not.toContain('setUpstream feature');
    });

    it('reports checkout failures with the directory', async () => {
      backend.add('/work/a', { failCheckout: true });

      const results = await orchestrator.switchBranch([checkFor('a', '/work/a', true)], 'feature');
      expect(results).toEqual([{
        repo: 'a', status: 'error', message: "Error switching branch for /work/a: pathspec 'feature' did not match",
      }]);
    });
  });

  describe('configureUpstreamIfSafe', () => {
    const diverged = (conflicts: boolean) => new FakeRepoGit({
      head: LOCAL,
      refs: ['refs/remotes/origin/feature'],
      revs: { 'refs/remotes/origin/feature': REMOTE },
      mergeBase: BASE,
      conflicts,
    });

    it('tracks a remote branch that merges cleanly', async () => {
      const git = diverged(false);
      expect(await configureUpstreamIfSafe(git, 'feature')).toBe(' (tracking origin/feature)');
      expect(git.calls).toContain(`mergeConflicts ${BASE} ${LOCAL} ${REMOTE}`);
    });

    it('does not track a remote branch that would conflict', async () => {
      const git = diverged(true);
      expect(await configureUpstreamIfSafe(git, 'feature')).toBe(' (upstream not set: diverges from origin)');
      expect(git.calls).not.toContain('setUpstream feature');
    });

    it('returns nothing when origin lacks the branch', async () => {
      const git = new FakeRepoGit({ head: LOCAL });
      expect(await configureUpstreamIfSafe(git, 'feature')).toBe('');
    });

    it('reports a failed upstream update', async () => {
      const git = new FakeRepoGit({
        head: LOCAL, refs: ['refs/remotes/origin/feature'], revs: { 'refs/remotes/origin/feature': LOCAL }, failSetUpstream: true,
      });
      expect(await configureUpstreamIfSafe(git, 'feature')).toBe(' (upstream not set: no such branch)');
    });
  });
});

describe('resolveResetTarget', () => {
  it('prefers the revision, then the base branch, then the branch', () => {
    expect(resolveResetTarget(repo('a', { branch: 'main', 'base-branch': 'develop', revision: 'v1.0.0' }))).toBe('v1.0.0');
    expect(resolveResetTarget(repo('a', { branch: 'main', 'base-branch': 'develop' }))).toBe('develop');
    expect(resolveResetTarget(repo('a', { branch: 'main' }))).toBe('main');
  });
});
