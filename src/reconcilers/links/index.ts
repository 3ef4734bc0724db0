/**
 * Link reconciler exports
 *
 * Scans the store and workspace trees, diffs them against the declared
 * category tree, applies the resulting plan and adopts existing links.
 */

// Types from types.ts
export type {
  ObservedSymlink,
  ObservedEntryKind,
  ObservedEntry,
  WorkspaceSnapshot,
  StoreInventory,
  LinkActionKind,
  CreateLinkAction,
  RelinkAction,
  RemoveLinkAction,
  LinkAction,
  ConflictKind,
  NameCollisionConflict,
  PathObstructionConflict,
  CategoryRepoCollisionConflict,
  Conflict,
  ReconcileInput,
  OrphanLink,
  WorkspacePlan,
  ApplyOptions,
  ApplyActionResult,
  ApplyResult,
  AdoptedEntry,
  AdoptionResult,
} from './types.js';

// Scanning
export {
  REPOSITORY_MARKER,
  isRepository,
  isSymlink,
  tryRealpath,
  inspectStore,
  scanStore,
  scanStoreNonRepos,
  scanWorkspace,
  scanWorkspaceSymlinks,
} from './scan.js';

// Diff functions
export {
  reconcileWorkspace,
  describeAction,
  describeConflict,
  formatPlanSummary,
  formatPlanDetails,
} from './diff.js';

// Apply functions
export { applyPlan, cleanupEmptyDirectories, createRelativeSymlink } from './apply.js';

// Adoption
export { adoptFromSnapshot, adoptWorkspace } from './adopt.js';
