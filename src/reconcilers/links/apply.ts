/**
 * Plan execution
 *
 * Performs a WorkspacePlan against the filesystem: removes, then relinks,
 * then creates. New links are relative to the directory that holds them.
 * Failures are collected per action; nothing here decides policy.
 */

import {
  existsSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  realpathSync,
  rmdirSync,
  symlinkSync,
  unlinkSync,
} from 'node:fs';
import { basename, dirname, join, relative, sep } from 'node:path';
import { compareCodeUnits } from '../../registry/model.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { isRepository, isSymlink, tryRealpath } from './scan.js';
import type {
  ApplyActionResult,
  ApplyOptions,
  ApplyResult,
  LinkAction,
  WorkspacePlan,
} from './types.js';

// =============================================================================
// Link Operations
// =============================================================================

function pathExists(path: string): boolean {
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a relative symlink at `linkPath` pointing to `target`, making parents as needed
 *
 * The relative text is computed between canonical paths, since the kernel
 * resolves ".." against the real directory holding the link.
 */
export function createRelativeSymlink(linkPath: string, target: string): void {
  const parent = dirname(linkPath);
  mkdirSync(parent, { recursive: true });
  const realTarget =
    tryRealpath(target) ?? join(tryRealpath(dirname(target)) ?? dirname(target), basename(target));
  symlinkSync(relative(realpathSync(parent), realTarget), linkPath);
}

function executeAction(root: string, action: LinkAction): void {
  const linkPath = join(root, action.path);

  switch (action.kind) {
    case 'remove':
      if (!isSymlink(linkPath)) {
        throw new Error(`Refusing to remove ${linkPath}: not a symlink`);
      }
      unlinkSync(linkPath);
      return;

    case 'relink':
      if (isSymlink(linkPath)) {
        unlinkSync(linkPath);
      } else if (pathExists(linkPath)) {
        throw new Error(`Refusing to replace ${linkPath}: not a symlink`);
      }
      createRelativeSymlink(linkPath, action.newTarget);
      return;

    case 'create':
      if (action.replacesEmptyDirectory) {
        // rmdir fails on a non-empty directory, which is what we want
        rmdirSync(linkPath);
      } else if (pathExists(linkPath)) {
        throw new Error(`Refusing to overwrite ${linkPath}: path already exists`);
      }
      createRelativeSymlink(linkPath, action.target);
      return;
  }
}

const ACTION_ORDER: Record<LinkAction['kind'], number> = { remove: 0, relink: 1, create: 2 };

// =============================================================================
// Main Apply Function
// =============================================================================

/**
 * Apply a workspace plan
 *
 * In dry-run mode every action is reported as successful and nothing is touched.
 */
export function applyPlan(plan: WorkspacePlan, options: ApplyOptions): ApplyResult {
  const { dryRun, cleanupEmptyDirectories: cleanup = true } = options;
  const log: Logger = (options.logger ?? defaultLogger).child({ workspace: plan.workspace });

  const ordered = [...plan.actions].sort(
    (a, b) => ACTION_ORDER[a.kind] - ACTION_ORDER[b.kind]
  );

  const results: ApplyActionResult[] = [];
  const errors: string[] = [];

  for (const action of ordered) {
    if (dryRun) {
      log.debug(`Would ${action.kind} ${action.path}`);
      results.push({ action, success: true });
      continue;
    }

    try {
      executeAction(plan.root, action);
      log.debug(`${action.kind} ${action.path}`);
      results.push({ action, success: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Failed to ${action.kind} ${action.path}`, err instanceof Error ? err : undefined);
      results.push({ action, success: false, error: message });
      errors.push(`${capitalize(action.kind)} ${plan.workspace}/${action.path}: ${message}`);
    }
  }

  const removedDirectories = cleanup ? cleanupEmptyDirectories(plan.root, { dryRun }) : [];

  const succeeded = (kind: LinkAction['kind']): number =>
    results.filter((r) => r.success && r.action.kind === kind).length;

  return {
    workspace: plan.workspace,
    results,
    removedDirectories,
    summary: {
      created: succeeded('create'),
      relinked: succeeded('relink'),
      removed: succeeded('remove'),
      failed: results.filter((r) => !r.success).length,
    },
    errors,
    success: errors.length === 0,
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// =============================================================================
// Empty Directory Cleanup
// =============================================================================

/**
 * Remove directories under `root` that are empty, or contain only directories
 * that are removed in turn. The root itself is never removed, and repository
 * directories are not entered.
 *
 * @returns Workspace-relative paths of removed directories, sorted
 */
export function cleanupEmptyDirectories(
  root: string,
  options: { dryRun?: boolean } = {}
): string[] {
  const { dryRun = false } = options;
  if (!existsSync(root) || isSymlink(root)) {
    return [];
  }

  // Parents are always listed before their descendants
  const directories: string[] = [];
  const pending = [root];
  let dir = pending.pop();
  while (dir !== undefined) {
    directories.push(dir);
    for (const child of readdirSync(dir, { withFileTypes: true })) {
      const childPath = join(dir, child.name);
      if (child.isDirectory() && !isRepository(childPath)) {
        pending.push(childPath);
      }
    }
    dir = pending.pop();
  }

  const removed = new Set<string>();
  for (const directory of directories.reverse()) {
    if (directory === root) continue;
    const remaining = readdirSync(directory).filter((name) => !removed.has(join(directory, name)));
    if (remaining.length === 0) {
      if (!dryRun) {
        rmdirSync(directory);
      }
      removed.add(directory);
    }
  }

  return Array.from(removed)
    .map((path) => relative(root, path).split(sep).join('/'))
    .sort(compareCodeUnits);
}
