/**
 * Unit Tests: Store and Workspace Scanning
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { inspectStore, isRepository, scanWorkspace } from '../../src/reconcilers/links/scan.js';
import {
  createTestEnvironment,
  makeFile,
  makeLink,
  makeRepo,
  makeStoreDir,
  type TestEnvironment,
} from '../e2e/harness.js';

describe('inspectStore', () => {
  let env: TestEnvironment;

  beforeEach(async () => {
    env = await createTestEnvironment('scan-store');
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it('lists repositories and other directories separately, sorted', () => {
    makeRepo(env, 'zeta');
    makeRepo(env, 'alpha');
    makeStoreDir(env, 'notes');
    makeFile(join(env.store, 'README'));

    expect(inspectStore(env.store)).toEqual({
      repos: ['alpha', 'zeta'],
      nonRepos: ['notes'],
      duplicates: [],
    });
  });

  it('counts a .git file as a repository marker', () => {
    makeFile(join(env.store, 'worktree', '.git'), 'gitdir: ../alpha/.git/worktrees/w\n');
    expect(isRepository(join(env.store, 'worktree'))).toBe(true);
    expect(inspectStore(env.store).repos).toEqual(['worktree']);
  });

  it('follows symlinked children and drops canonical duplicates', () => {
    makeRepo(env, 'alpha');
    symlinkSync('alpha', join(env.store, 'beta'));

    expect(inspectStore(env.store)).toEqual({
      repos: ['alpha'],
      nonRepos: [],
      duplicates: ['beta'],
    });
  });

  it('returns an empty inventory for a missing store', () => {
    expect(inspectStore(join(env.root, 'missing'))).toEqual({
      repos: [],
      nonRepos: [],
      duplicates: [],
    });
  });
});

describe('scanWorkspace', () => {
  let env: TestEnvironment;
  let root: string;

  beforeEach(async () => {
    env = await createTestEnvironment('scan-workspace');
    root = join(env.home, 'Projects');
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it('reports a missing root', () => {
    expect(scanWorkspace(root, 'Projects')).toEqual({
      workspace: 'Projects',
      root,
      exists: false,
      symlinks: [],
      entries: [],
    });
  });

  it('records symlinks with their category and targets', () => {
    const tool = makeRepo(env, 'tool');
    makeLink(join(root, 'vendor', 'acme', 'tool'), '../../../code/tool');

    const snapshot = scanWorkspace(root, 'Projects');

    expect(snapshot.symlinks).toEqual([
      {
        workspace: 'Projects',
        path: 'vendor/acme/tool',
        categoryPath: 'vendor/acme',
        name: 'tool',
        target: '../../../code/tool',
        resolvedTarget: tool,
        realTarget: tool,
        dangling: false,
      },
    ]);
    expect(snapshot.entries).toEqual([
      { path: 'vendor', kind: 'directory', empty: false },
      { path: 'vendor/acme', kind: 'directory', empty: false },
    ]);
  });

  it('marks dangling links', () => {
    makeLink(join(root, 'gone'), join(env.store, 'gone'));

    const [link] = scanWorkspace(root, 'Projects').symlinks;
    expect(link?.dangling).toBe(true);
    expect(link?.realTarget).toBeUndefined();
    expect(link?.resolvedTarget).toBe(join(env.store, 'gone'));
  });

  it('records files, empty directories and repository clones without descending', () => {
    makeFile(join(root, 'notes.txt'));
    mkdirSync(join(root, 'empty'), { recursive: true });
    mkdirSync(join(root, 'clone', '.git', 'objects'), { recursive: true });
    makeLink(join(root, 'clone', 'inner-link'), '/tmp');

    const snapshot = scanWorkspace(root, 'Projects');

    expect(snapshot.entries).toEqual([
      { path: 'clone', kind: 'repository', empty: false },
      { path: 'empty', kind: 'directory', empty: true },
      { path: 'notes.txt', kind: 'file', empty: false },
    ]);
    expect(snapshot.symlinks).toEqual([]);
  });

  it('does not follow symlinked directories', () => {
    const tool = makeRepo(env, 'tool');
    makeFile(join(tool, 'src', 'index.ts'));
    makeLink(join(root, 'tool'), tool);

    const snapshot = scanWorkspace(root, 'Projects');
    expect(snapshot.symlinks.map((link) => link.path)).toEqual(['tool']);
    expect(snapshot.entries).toEqual([]);
  });
});
