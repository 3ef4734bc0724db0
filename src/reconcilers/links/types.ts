/**
 * Types for symlink reconciliation
 *
 * Observed state comes from scanning a workspace directory; desired state is
 * the workspace's category tree. The diff produces a plan of link actions plus
 * the conflicts that block parts of it.
 */

import type { RepoEntry, Workspace } from '../../registry/types.js';
import type { Logger } from '../../utils/logger.js';

// =============================================================================
// Observed State
// =============================================================================

/**
 * A symlink found inside a workspace tree
 */
export interface ObservedSymlink {
  workspace: string;
  /** Path relative to the workspace root, "/"-separated */
  path: string;
  /** Category path of the containing directory ("." for the root) */
  categoryPath: string;
  /** Link name (last path segment) */
  name: string;
  /** Raw link text */
  target: string;
  /** Absolute target, resolved lexically against the link's directory */
  resolvedTarget: string;
  /** Canonical target, when the link resolves */
  realTarget?: string;
  dangling: boolean;
}

export type ObservedEntryKind = 'directory' | 'repository' | 'file';

/**
 * A non-symlink entry found inside a workspace tree
 */
export interface ObservedEntry {
  /** Path relative to the workspace root, "/"-separated */
  path: string;
  kind: ObservedEntryKind;
  /** Directory with no children (always false for files and repositories) */
  empty: boolean;
}

/**
 * Everything a scan saw in one workspace
 */
export interface WorkspaceSnapshot {
  workspace: string;
  /** Absolute workspace root */
  root: string;
  /** False when the root does not exist (an empty observed state) */
  exists: boolean;
  symlinks: ObservedSymlink[];
  entries: ObservedEntry[];
}

/**
 * Result of inspecting the store directory
 */
export interface StoreInventory {
  /** Child directories carrying a repository marker, sorted */
  repos: string[];
  /** Child directories without one, sorted */
  nonRepos: string[];
  /** Names dropped because they resolve to an already-listed repository */
  duplicates: string[];
}

// =============================================================================
// Plan
// =============================================================================

export type LinkActionKind = 'create' | 'relink' | 'remove';

interface LinkActionBase {
  workspace: string;
  categoryPath: string;
  symlinkName: string;
  /** Path relative to the workspace root */
  path: string;
}

export interface CreateLinkAction extends LinkActionBase {
  kind: 'create';
  repoName: string;
  /** Absolute store path of the repository */
  target: string;
  /** An empty directory occupies the path and is removed first */
  replacesEmptyDirectory: boolean;
}

export interface RelinkAction extends LinkActionBase {
  kind: 'relink';
  repoName: string;
  /** Raw text of the current link */
  oldTarget: string;
  newTarget: string;
}

export interface RemoveLinkAction extends LinkActionBase {
  kind: 'remove';
  oldTarget: string;
}

export type LinkAction = CreateLinkAction | RelinkAction | RemoveLinkAction;

export type ConflictKind = 'name-collision' | 'path-obstruction' | 'category-repo-collision';

/**
 * Two or more repositories want the same link name in one category
 */
export interface NameCollisionConflict {
  kind: 'name-collision';
  workspace: string;
  categoryPath: string;
  symlinkName: string;
  repoNames: string[];
}

/**
 * Something other than a managed symlink stands where a link (or one of its
 * category directories) must go
 */
export interface PathObstructionConflict {
  kind: 'path-obstruction';
  workspace: string;
  categoryPath: string;
  symlinkName: string;
  /** Workspace-relative path of the obstructing entry */
  path: string;
  obstruction: ObservedEntryKind | 'symlink';
}

/**
 * A category path segment is also a declared link name one level up
 */
export interface CategoryRepoCollisionConflict {
  kind: 'category-repo-collision';
  workspace: string;
  categoryPath: string;
  parentCategory: string;
  symlinkName: string;
}

export type Conflict =
  | NameCollisionConflict
  | PathObstructionConflict
  | CategoryRepoCollisionConflict;

/**
 * Inputs to a single workspace reconciliation
 */
export interface ReconcileInput {
  workspace: Workspace;
  /** Absolute store path */
  storePath: string;
  /** Canonical store path, when it differs (e.g. the store is itself a symlink) */
  storeRealPath?: string;
  /** Repositories present in the store */
  storeRepos: Iterable<string>;
  snapshot: WorkspaceSnapshot;
  /** Emit remove actions for undeclared symlinks (default: false) */
  prune?: boolean;
}

/**
 * An observed symlink with no declared entry at its location
 */
export interface OrphanLink {
  path: string;
  categoryPath: string;
  name: string;
  target: string;
  dangling: boolean;
}

/**
 * Reconciliation plan for one workspace
 */
export interface WorkspacePlan {
  workspace: string;
  root: string;
  storePath: string;
  /** Ordered by category path, then link name */
  actions: LinkAction[];
  /** Ordered by category path, then link name */
  conflicts: Conflict[];
  warnings: string[];
  orphans: OrphanLink[];
  summary: {
    toCreate: number;
    toRelink: number;
    toRemove: number;
    unchanged: number;
    conflicts: number;
  };
  hasChanges: boolean;
}

// =============================================================================
// Apply
// =============================================================================

export interface ApplyOptions {
  /** Describe the actions without touching the filesystem */
  dryRun: boolean;
  /** Remove category directories left empty (default: true) */
  cleanupEmptyDirectories?: boolean;
  logger?: Logger;
}

/**
 * Result of applying a single action
 */
export interface ApplyActionResult {
  action: LinkAction;
  success: boolean;
  error?: string;
}

/**
 * Result of applying a plan
 */
export interface ApplyResult {
  workspace: string;
  results: ApplyActionResult[];
  /** Directories removed (or that would be) by empty-directory cleanup */
  removedDirectories: string[];
  summary: {
    created: number;
    relinked: number;
    removed: number;
    failed: number;
  };
  errors: string[];
  success: boolean;
}

// =============================================================================
// Adoption
// =============================================================================

/**
 * An entry inferred from an existing symlink
 */
export interface AdoptedEntry {
  categoryPath: string;
  entry: RepoEntry;
  /** Workspace-relative path of the symlink it came from */
  path: string;
}

export interface AdoptionResult {
  workspace: string;
  entries: AdoptedEntry[];
  warnings: string[];
}
