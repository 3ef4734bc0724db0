/**
 * Link diffing: declared category tree vs. scanned workspace
 *
 * Pure function of its inputs. Produces the actions that would make the
 * workspace match its declaration, plus blocking conflicts and advisory
 * warnings. Anything ambiguous becomes a conflict; nothing is guessed.
 */

import { join } from 'node:path';
import type { RepoEntry } from '../../registry/types.js';
import {
  categorySegments,
  compareCodeUnits,
  findCategoryLinkCollisions,
  formatLinkLocation,
  formatRepoEntry,
  joinCategoryPath,
  symlinkName,
} from '../../registry/model.js';
import { indexEntries } from './scan.js';
import type {
  Conflict,
  LinkAction,
  ObservedSymlink,
  OrphanLink,
  PathObstructionConflict,
  ReconcileInput,
  WorkspacePlan,
} from './types.js';

interface LinkTarget {
  categoryPath: string;
  symlinkName: string;
  repoName: string;
  path: string;
}

interface Located {
  categoryPath: string;
  symlinkName: string;
}

function compareLocations(a: Located, b: Located): number {
  return (
    compareCodeUnits(a.categoryPath, b.categoryPath) ||
    compareCodeUnits(a.symlinkName, b.symlinkName)
  );
}

function isAtOrUnder(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(`${prefix}/`);
}

// =============================================================================
// Flattening
// =============================================================================

interface FlattenResult {
  targets: LinkTarget[];
  /** Every declared location, including ones a conflict blocks */
  declaredPaths: Set<string>;
  /** Categories with a name collision; their links are left alone */
  blockedCategories: Set<string>;
  conflicts: Conflict[];
  warnings: string[];
}

function flattenCategories(input: ReconcileInput): FlattenResult {
  const { workspace } = input;
  const result: FlattenResult = {
    targets: [],
    declaredPaths: new Set(),
    blockedCategories: new Set(),
    conflicts: [],
    warnings: [],
  };

  for (const categoryPath of Object.keys(workspace.categories).sort(compareCodeUnits)) {
    const category = workspace.categories[categoryPath];
    if (!category) continue;

    const byName = new Map<string, RepoEntry[]>();
    for (const entry of category.entries) {
      const name = symlinkName(entry);
      const group = byName.get(name) ?? [];
      group.push(entry);
      byName.set(name, group);
      result.declaredPaths.add(joinCategoryPath(categoryPath, name));
    }

    const categoryTargets: LinkTarget[] = [];
    for (const name of Array.from(byName.keys()).sort(compareCodeUnits)) {
      const group = byName.get(name) ?? [];
      const repoNames = Array.from(new Set(group.map((entry) => entry.repoName))).sort(
        compareCodeUnits
      );
      const first = group[0];
      if (!first) continue;

      if (repoNames.length > 1) {
        result.conflicts.push({
          kind: 'name-collision',
          workspace: workspace.name,
          categoryPath,
          symlinkName: name,
          repoNames,
        });
        result.blockedCategories.add(categoryPath);
        continue;
      }

      if (group.length > 1) {
        result.warnings.push(
          `Duplicate entry '${formatRepoEntry(first)}' in ${formatLinkLocation(workspace.name, categoryPath, '')} (collapsed)`
        );
      }

      categoryTargets.push({
        categoryPath,
        symlinkName: name,
        repoName: first.repoName,
        path: joinCategoryPath(categoryPath, name),
      });
    }

    if (!result.blockedCategories.has(categoryPath)) {
      result.targets.push(...categoryTargets);
    }
  }

  return result;
}

// =============================================================================
// Main Diff Function
// =============================================================================

/**
 * Compare a workspace's declared links with its scanned state and produce a plan
 */
export function reconcileWorkspace(input: ReconcileInput): WorkspacePlan {
  const { workspace, storePath, snapshot, prune = false } = input;
  const storeRepos = new Set(input.storeRepos);
  const storeRoots = [storePath];
  if (input.storeRealPath !== undefined && input.storeRealPath !== storePath) {
    storeRoots.push(input.storeRealPath);
  }

  const flattened = flattenCategories(input);
  const conflicts: Conflict[] = [...flattened.conflicts];
  const warnings: string[] = [...flattened.warnings];
  const actions: LinkAction[] = [];
  let unchanged = 0;

  // Category paths that run through a declared link
  const blockedPrefixes: string[] = [];
  for (const collision of findCategoryLinkCollisions(workspace)) {
    conflicts.push({
      kind: 'category-repo-collision',
      workspace: workspace.name,
      categoryPath: collision.categoryPath,
      parentCategory: collision.parentCategory,
      symlinkName: collision.symlinkName,
    });
    blockedPrefixes.push(joinCategoryPath(collision.parentCategory, collision.symlinkName));
  }

  const symlinksByPath = new Map(snapshot.symlinks.map((link) => [link.path, link]));
  const entriesByPath = indexEntries(snapshot.entries);
  const declaredCategories = Object.keys(workspace.categories);

  // Orphans first: pruning one can clear the way for a category directory
  const orphans: OrphanLink[] = [];
  for (const link of snapshot.symlinks) {
    if (flattened.declaredPaths.has(link.path)) continue;
    if (flattened.blockedCategories.has(link.categoryPath)) continue;
    orphans.push({
      path: link.path,
      categoryPath: link.categoryPath,
      name: link.name,
      target: link.target,
      dangling: link.dangling,
    });
  }
  const prunedPaths = new Set(prune ? orphans.map((orphan) => orphan.path) : []);

  const targetMatches = (link: ObservedSymlink, repoName: string): boolean => {
    const expected = storeRoots.map((root) => join(root, repoName));
    if (link.realTarget !== undefined && expected.includes(link.realTarget)) {
      return true;
    }
    // A lexical match only counts if the link works, or cannot work yet
    return (
      expected.includes(link.resolvedTarget) && (!link.dangling || !storeRepos.has(repoName))
    );
  };

  const obstruction = (
    target: LinkTarget,
    path: string,
    kind: PathObstructionConflict['obstruction']
  ): PathObstructionConflict => ({
    kind: 'path-obstruction',
    workspace: workspace.name,
    categoryPath: target.categoryPath,
    symlinkName: target.symlinkName,
    path,
    obstruction: kind,
  });

  const findParentObstruction = (target: LinkTarget): PathObstructionConflict | undefined => {
    const segments = categorySegments(target.categoryPath);
    for (let i = 1; i <= segments.length; i++) {
      const prefix = segments.slice(0, i).join('/');
      const link = symlinksByPath.get(prefix);
      if (link && !prunedPaths.has(prefix)) {
        return obstruction(target, prefix, 'symlink');
      }
      const entry = entriesByPath.get(prefix);
      if (entry && entry.kind !== 'directory') {
        return obstruction(target, prefix, entry.kind);
      }
    }
    return undefined;
  };

  for (const target of flattened.targets) {
    if (blockedPrefixes.some((prefix) => isAtOrUnder(target.path, prefix))) {
      continue;
    }

    const parentObstruction = findParentObstruction(target);
    if (parentObstruction) {
      conflicts.push(parentObstruction);
      continue;
    }

    const expected = join(storePath, target.repoName);
    const location = formatLinkLocation(workspace.name, target.categoryPath, target.symlinkName);
    const observed = symlinksByPath.get(target.path);
    const base = {
      workspace: workspace.name,
      categoryPath: target.categoryPath,
      symlinkName: target.symlinkName,
      path: target.path,
    };

    if (observed) {
      if (targetMatches(observed, target.repoName)) {
        unchanged++;
      } else {
        actions.push({
          ...base,
          kind: 'relink',
          repoName: target.repoName,
          oldTarget: observed.target,
          newTarget: expected,
        });
      }
    } else {
      const entry = entriesByPath.get(target.path);
      const isCategoryDirectory = declaredCategories.some((path) => isAtOrUnder(path, target.path));

      if (entry && !(entry.kind === 'directory' && entry.empty && !isCategoryDirectory)) {
        conflicts.push(obstruction(target, target.path, entry.kind));
        continue;
      }

      actions.push({
        ...base,
        kind: 'create',
        repoName: target.repoName,
        target: expected,
        replacesEmptyDirectory: entry !== undefined,
      });
    }

    if (!storeRepos.has(target.repoName)) {
      warnings.push(
        `Repository '${target.repoName}' not found in store ${storePath} (${location} will be dangling)`
      );
    }
  }

  for (const orphan of orphans) {
    if (prune) {
      actions.push({
        kind: 'remove',
        workspace: workspace.name,
        categoryPath: orphan.categoryPath,
        symlinkName: orphan.name,
        path: orphan.path,
        oldTarget: orphan.target,
      });
    } else {
      const suffix = orphan.dangling ? ' (dangling)' : '';
      warnings.push(
        `Orphaned symlink ${workspace.name}/${orphan.path} (not declared in any category)${suffix}`
      );
    }
  }

  actions.sort(compareLocations);
  conflicts.sort(compareLocations);

  const summary = {
    toCreate: actions.filter((action) => action.kind === 'create').length,
    toRelink: actions.filter((action) => action.kind === 'relink').length,
    toRemove: actions.filter((action) => action.kind === 'remove').length,
    unchanged,
    conflicts: conflicts.length,
  };

  return {
    workspace: workspace.name,
    root: snapshot.root,
    storePath,
    actions,
    conflicts,
    warnings,
    orphans,
    summary,
    hasChanges: actions.length > 0,
  };
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * One-line description of an action
 */
export function describeAction(action: LinkAction): string {
  const location = `${action.workspace}/${action.path}`;
  switch (action.kind) {
    case 'create':
      return action.replacesEmptyDirectory
        ? `${location} -> ${action.target} (replaces empty directory)`
        : `${location} -> ${action.target}`;
    case 'relink':
      return `${location}: ${action.oldTarget} -> ${action.newTarget}`;
    case 'remove':
      return `${location} (was -> ${action.oldTarget})`;
  }
}

/**
 * One-line description of a conflict
 */
export function describeConflict(conflict: Conflict): string {
  switch (conflict.kind) {
    case 'name-collision':
      return `Name collision at ${formatLinkLocation(conflict.workspace, conflict.categoryPath, conflict.symlinkName)}: repos ${conflict.repoNames.join(', ')}`;
    case 'path-obstruction':
      return `Path obstruction at ${conflict.workspace}/${conflict.path}: a ${conflict.obstruction} blocks ${formatLinkLocation(conflict.workspace, conflict.categoryPath, conflict.symlinkName)}`;
    case 'category-repo-collision':
      return `Category '${conflict.categoryPath}' in ${conflict.workspace} conflicts with repo '${conflict.symlinkName}' in category '${conflict.parentCategory}'`;
  }
}

/**
 * Format a plan as a human-readable summary
 */
export function formatPlanSummary(plan: WorkspacePlan): string {
  const lines: string[] = [];
  const { summary } = plan;

  lines.push(`Workspace: ${plan.workspace} (${plan.root})`);
  lines.push('Actions:');
  if (summary.toCreate > 0) lines.push(`  + Create: ${summary.toCreate}`);
  if (summary.toRelink > 0) lines.push(`  ~ Relink: ${summary.toRelink}`);
  if (summary.toRemove > 0) lines.push(`  - Remove: ${summary.toRemove}`);
  lines.push(`  = Unchanged: ${summary.unchanged}`);
  if (summary.conflicts > 0) lines.push(`  X Conflicts: ${summary.conflicts}`);

  if (plan.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of plan.warnings) {
      lines.push(`  ! ${warning}`);
    }
  }

  if (plan.conflicts.length > 0) {
    lines.push('Status: CONFLICTS');
  } else if (plan.hasChanges) {
    lines.push('Status: CHANGES NEEDED');
  } else {
    lines.push('Status: IN SYNC');
  }

  return lines.join('\n');
}

/**
 * Format every action and conflict of a plan
 */
export function formatPlanDetails(plan: WorkspacePlan): string {
  const lines: string[] = [];
  const icons: Record<LinkAction['kind'], string> = { create: '+', relink: '~', remove: '-' };

  for (const action of plan.actions) {
    lines.push(`  ${icons[action.kind]} ${describeAction(action)}`);
  }
  for (const conflict of plan.conflicts) {
    lines.push(`  X ${describeConflict(conflict)}`);
  }

  return lines.join('\n');
}
