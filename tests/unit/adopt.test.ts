/**
 * Unit Tests: Adoption
 *
 * Inferring entries from existing workspace symlinks, and merging them into
 * a configuration.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { adoptWorkspace } from '../../src/reconcilers/links/adopt.js';
import { mergeAdoptedEntries } from '../../src/commands/adopt.js';
import { parseRepoEntry } from '../../src/registry/model.js';
import type { Workspace } from '../../src/registry/types.js';
import {
  createTestEnvironment,
  makeLink,
  makeRepo,
  makeStoreDir,
  type TestEnvironment,
} from '../e2e/harness.js';

describe('adoptWorkspace', () => {
  let env: TestEnvironment;
  let root: string;

  beforeEach(async () => {
    env = await createTestEnvironment('adopt');
    root = join(env.home, 'Projects');
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it('derives entries from links into the store', () => {
    makeRepo(env, 'tool');
    makeRepo(env, 'acme-code');
    makeLink(join(root, 'tool'), '../code/tool');
    makeLink(join(root, 'vendor', 'git'), join(env.store, 'acme-code'));

    const result = adoptWorkspace(root, 'Projects', env.store);

    expect(result.warnings).toEqual([]);
    expect(result.entries).toEqual([
      { categoryPath: '.', entry: { repoName: 'tool' }, path: 'tool' },
      { categoryPath: 'vendor', entry: { repoName: 'acme-code', alias: 'git' }, path: 'vendor/git' },
    ]);
  });

  it('adopts links to store directories that are not repositories', () => {
    makeStoreDir(env, 'scratch');
    makeLink(join(root, 'scratch'), '../code/scratch');

    expect(adoptWorkspace(root, 'Projects', env.store).entries).toEqual([
      { categoryPath: '.', entry: { repoName: 'scratch' }, path: 'scratch' },
    ]);
  });

  it('skips broken links and links outside the store', () => {
    makeLink(join(root, 'broken'), '../code/missing');
    makeLink(join(root, 'outside'), env.home);

    const result = adoptWorkspace(root, 'Projects', env.store);

    expect(result.entries).toEqual([]);
    expect(result.warnings).toEqual([
      'Skipping Projects/broken (broken symlink)',
      `Skipping Projects/outside -> ${env.home} (not in store directory)`,
    ]);
  });

  it('skips links into nested store paths', () => {
    makeRepo(env, 'tool');
    makeLink(join(root, 'docs'), '../code/tool/.git');

    expect(adoptWorkspace(root, 'Projects', env.store).warnings).toEqual([
      `Skipping Projects/docs -> ${join(env.store, 'tool', '.git')} (not in store directory)`,
    ]);
  });

  it('skips repository names containing a colon', () => {
    makeRepo(env, 'odd:name');
    makeLink(join(root, 'odd'), '../code/odd:name');

    expect(adoptWorkspace(root, 'Projects', env.store).warnings).toEqual([
      "Skipping Projects/odd (repository name 'odd:name' contains ':')",
    ]);
  });

  it('returns nothing for a missing workspace', () => {
    expect(adoptWorkspace(root, 'Projects', env.store)).toEqual({
      workspace: 'Projects',
      entries: [],
      warnings: [],
    });
  });
});

describe('mergeAdoptedEntries', () => {
  function createWorkspace(categories: Record<string, string[]>): Workspace {
    const workspace: Workspace = { name: 'Projects', path: '/srv/Projects', categories: {} };
    for (const [path, entries] of Object.entries(categories)) {
      workspace.categories[path] = { path, entries: entries.map(parseRepoEntry) };
    }
    return workspace;
  }

  it('adds new locations and skips declared ones', () => {
    const workspace = createWorkspace({ '.': ['tool', 'other:git'] });

    const result = mergeAdoptedEntries(workspace, [
      { categoryPath: '.', entry: { repoName: 'tool' }, path: 'tool' },
      { categoryPath: '.', entry: { repoName: 'acme-code', alias: 'git' }, path: 'git' },
      { categoryPath: 'vendor', entry: { repoName: 'sdk' }, path: 'vendor/sdk' },
    ]);

    expect(result.added.map((e) => e.path)).toEqual(['vendor/sdk']);
    expect(result.skipped.map((e) => e.path)).toEqual(['tool', 'git']);
    expect(workspace.categories['vendor']?.entries).toEqual([{ repoName: 'sdk' }]);
    expect(workspace.categories['.']?.entries).toEqual([
      { repoName: 'tool' },
      { repoName: 'other', alias: 'git' },
    ]);
  });
});
