/**
 * Adoption: infer declared entries from symlinks already in a workspace
 *
 * Read-only. Merging the result into a configuration is the caller's job.
 */

import { basename, dirname } from 'node:path';
import type { RepoEntry } from '../../registry/types.js';
import { scanWorkspace, tryRealpath } from './scan.js';
import type { AdoptedEntry, AdoptionResult, WorkspaceSnapshot } from './types.js';

/**
 * Derive entries from a scanned workspace.
 *
 * A link is adopted when its target sits directly inside the store; the
 * target's name becomes the repository and the link's name becomes the alias
 * when the two differ. Dangling links and links into other directories are
 * skipped with a warning.
 */
export function adoptFromSnapshot(
  snapshot: WorkspaceSnapshot,
  storePath: string,
  storeRealPath?: string
): AdoptionResult {
  const storeRoots = new Set([storePath]);
  if (storeRealPath !== undefined) {
    storeRoots.add(storeRealPath);
  }

  const entries: AdoptedEntry[] = [];
  const warnings: string[] = [];

  for (const link of snapshot.symlinks) {
    const location = `${snapshot.workspace}/${link.path}`;

    if (link.dangling) {
      warnings.push(`Skipping ${location} (broken symlink)`);
      continue;
    }

    const candidates = [link.resolvedTarget];
    if (link.realTarget !== undefined && link.realTarget !== link.resolvedTarget) {
      candidates.push(link.realTarget);
    }
    const inStore = candidates.find((candidate) => storeRoots.has(dirname(candidate)));

    if (inStore === undefined) {
      warnings.push(`Skipping ${location} -> ${link.realTarget ?? link.resolvedTarget} (not in store directory)`);
      continue;
    }

    const repoName = basename(inStore);
    if (repoName.includes(':')) {
      warnings.push(`Skipping ${location} (repository name '${repoName}' contains ':')`);
      continue;
    }

    const entry: RepoEntry = link.name === repoName ? { repoName } : { repoName, alias: link.name };
    entries.push({ categoryPath: link.categoryPath, entry, path: link.path });
  }

  return { workspace: snapshot.workspace, entries, warnings };
}

/**
 * Scan a workspace directory and adopt its symlinks
 */
export function adoptWorkspace(root: string, name: string, storePath: string): AdoptionResult {
  return adoptFromSnapshot(scanWorkspace(root, name), storePath, tryRealpath(storePath));
}
