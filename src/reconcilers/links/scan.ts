/**
 * Filesystem scanning for the store and workspace trees
 *
 * Scans are synchronous and never follow symlinks while walking: a symlink is
 * always a leaf. A missing directory scans as empty.
 */

import {
  existsSync,
  lstatSync,
  readdirSync,
  readlinkSync,
  realpathSync,
  statSync,
} from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { ROOT_CATEGORY } from '../../registry/types.js';
import { compareCodeUnits, joinCategoryPath } from '../../registry/model.js';
import type {
  ObservedEntry,
  ObservedSymlink,
  StoreInventory,
  WorkspaceSnapshot,
} from './types.js';

/** Entry whose presence marks a directory as a repository */
export const REPOSITORY_MARKER = '.git';

/**
 * Canonical path, or undefined when any component does not resolve
 */
export function tryRealpath(path: string): string | undefined {
  try {
    return realpathSync(path);
  } catch {
    return undefined;
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether a directory carries a repository marker (directory or file)
 */
export function isRepository(path: string): boolean {
  return existsSync(join(path, REPOSITORY_MARKER));
}

// =============================================================================
// Store
// =============================================================================

/**
 * Classify the store's direct child directories.
 *
 * Symlinked children count when they point at a directory. A child whose
 * canonical path equals an earlier repository's is listed under `duplicates`
 * instead of `repos`, so every listed repository is a distinct directory.
 */
export function inspectStore(storePath: string): StoreInventory {
  const inventory: StoreInventory = { repos: [], nonRepos: [], duplicates: [] };
  if (!isDirectory(storePath)) {
    return inventory;
  }

  const names = readdirSync(storePath).sort(compareCodeUnits);
  const seen = new Set<string>();

  for (const name of names) {
    const path = join(storePath, name);
    if (!isDirectory(path)) continue;

    if (!isRepository(path)) {
      inventory.nonRepos.push(name);
      continue;
    }

    const canonical = tryRealpath(path) ?? path;
    if (seen.has(canonical)) {
      inventory.duplicates.push(name);
      continue;
    }
    seen.add(canonical);
    inventory.repos.push(name);
  }

  return inventory;
}

/**
 * Sorted names of repositories in the store
 */
export function scanStore(storePath: string): string[] {
  return inspectStore(storePath).repos;
}

/**
 * Sorted names of store directories that are not repositories
 */
export function scanStoreNonRepos(storePath: string): string[] {
  return inspectStore(storePath).nonRepos;
}

// =============================================================================
// Workspace
// =============================================================================

interface PendingDirectory {
  dir: string;
  categoryPath: string;
}

function observeSymlink(
  workspace: string,
  linkPath: string,
  categoryPath: string,
  name: string
): ObservedSymlink {
  const target = readlinkSync(linkPath);
  const resolvedTarget = resolve(dirname(linkPath), target);
  const realTarget = tryRealpath(linkPath);

  const observed: ObservedSymlink = {
    workspace,
    path: joinCategoryPath(categoryPath, name),
    categoryPath,
    name,
    target,
    resolvedTarget,
    dangling: realTarget === undefined,
  };
  if (realTarget !== undefined) {
    observed.realTarget = realTarget;
  }
  return observed;
}

/**
 * Walk a workspace tree and record every symlink and non-symlink entry.
 *
 * Uses an explicit worklist, so tree depth is bounded only by memory. Plain
 * directories are descended; directories holding a repository marker are
 * recorded as `repository` entries and not descended.
 */
export function scanWorkspace(root: string, name: string): WorkspaceSnapshot {
  const absoluteRoot = resolve(root);
  const snapshot: WorkspaceSnapshot = {
    workspace: name,
    root: absoluteRoot,
    exists: isDirectory(absoluteRoot),
    symlinks: [],
    entries: [],
  };
  if (!snapshot.exists) {
    return snapshot;
  }

  const pending: PendingDirectory[] = [{ dir: absoluteRoot, categoryPath: ROOT_CATEGORY }];

  let next = pending.pop();
  while (next) {
    const { dir, categoryPath } = next;

    for (const child of readdirSync(dir, { withFileTypes: true })) {
      const childPath = join(dir, child.name);
      const relPath = joinCategoryPath(categoryPath, child.name);

      if (child.isSymbolicLink()) {
        snapshot.symlinks.push(observeSymlink(name, childPath, categoryPath, child.name));
      } else if (child.isDirectory()) {
        if (isRepository(childPath)) {
          snapshot.entries.push({ path: relPath, kind: 'repository', empty: false });
          continue;
        }
        const empty = readdirSync(childPath).length === 0;
        snapshot.entries.push({ path: relPath, kind: 'directory', empty });
        if (!empty) {
          pending.push({ dir: childPath, categoryPath: relPath });
        }
      } else {
        snapshot.entries.push({ path: relPath, kind: 'file', empty: false });
      }
    }

    next = pending.pop();
  }

  snapshot.symlinks.sort((a, b) => compareCodeUnits(a.path, b.path));
  snapshot.entries.sort((a, b) => compareCodeUnits(a.path, b.path));
  return snapshot;
}

/**
 * Symlinks of a workspace tree, sorted by path
 */
export function scanWorkspaceSymlinks(root: string, name: string): ObservedSymlink[] {
  return scanWorkspace(root, name).symlinks;
}

/**
 * Whether a path is a symlink (without following it)
 */
export function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}

/**
 * Index observed entries by path
 */
export function indexEntries(entries: ObservedEntry[]): Map<string, ObservedEntry> {
  return new Map(entries.map((entry) => [entry.path, entry]));
}
