/**
 * Configuration validation logic
 *
 * Rules:
 * 1. Store and workspace directories exist (warnings)
 * 2. Link names are unique within a category
 * 3. No category path runs through a declared link
 * 4. A repository appears in at most one category per workspace (warning)
 * 5. Declared repositories exist in the store (warning, needs a store scan)
 *
 * @example Invalid configuration - category/link collision
 * ```yaml
 * Projects:
 *   .: [foo]
 *   foo/bar: [baz]   # ERROR: "foo" is already a link at the root
 * ```
 */

import { existsSync } from 'node:fs';
import type { LinkspaceConfig, Workspace } from './types.js';
import {
  compareCodeUnits,
  findCategoryLinkCollisions,
  findSymlinkNameCollisions,
} from './model.js';
import {
  type ValidationIssue,
  type ValidationResult,
  ConfigValidationError,
  categoryRepoCollision,
  duplicateSymlinkName,
  mergeValidationResults,
  repoInMultipleCategories,
  repoNotInStore,
  storeNotFound,
  validationFailure,
  validationSuccess,
  workspacePathNotFound,
} from './errors.js';

// =============================================================================
// Validation Options
// =============================================================================

export interface ConfigValidationOptions {
  /** Check that the store and workspace directories exist (default: true) */
  checkPathsExist?: boolean;
  /** Repositories present in the store; enables the REPO_NOT_IN_STORE rule */
  storeRepos?: Iterable<string>;
  /** Throw on validation failure (default: false - returns result) */
  throwOnError?: boolean;
}

// =============================================================================
// Main Validation Function
// =============================================================================

/**
 * Validate a configuration against all rules
 *
 * @throws ConfigValidationError if throwOnError is true and validation fails
 */
export function validateConfigRules(
  config: LinkspaceConfig,
  options: ConfigValidationOptions = {}
): ValidationResult {
  const { checkPathsExist = true, storeRepos, throwOnError = false } = options;
  const workspaces = sortedWorkspaces(config);

  const results: ValidationResult[] = [];

  if (checkPathsExist) {
    results.push(validatePathsExist(config));
  }

  for (const workspace of workspaces) {
    results.push(validateUniqueSymlinkNames(workspace));
    results.push(validateCategoryPaths(workspace));
    results.push(validateSingleCategoryPerRepo(workspace));
    if (storeRepos) {
      results.push(validateReposInStore(workspace, new Set(storeRepos), config.storePath));
    }
  }

  const finalResult = mergeValidationResults(...results);

  if (throwOnError && !finalResult.valid) {
    const errorCount = finalResult.errors.length;
    throw new ConfigValidationError(
      `Configuration validation failed with ${errorCount} error${errorCount > 1 ? 's' : ''}`,
      finalResult
    );
  }

  return finalResult;
}

function sortedWorkspaces(config: LinkspaceConfig): Workspace[] {
  return Object.keys(config.workspaces)
    .sort(compareCodeUnits)
    .flatMap((name) => {
      const workspace = config.workspaces[name];
      return workspace ? [workspace] : [];
    });
}

// =============================================================================
// Rule: Paths Exist
// =============================================================================

export function validatePathsExist(config: LinkspaceConfig): ValidationResult {
  const issues: ValidationIssue[] = [];

  if (!existsSync(config.storePath)) {
    issues.push(storeNotFound(config.storePath));
  }
  for (const workspace of sortedWorkspaces(config)) {
    if (!existsSync(workspace.path)) {
      issues.push(workspacePathNotFound(workspace.name, workspace.path));
    }
  }

  return issues.length > 0 ? validationFailure(issues) : validationSuccess();
}

// =============================================================================
// Rule: Unique Link Names
// =============================================================================

export function validateUniqueSymlinkNames(workspace: Workspace): ValidationResult {
  const issues = findSymlinkNameCollisions(workspace).map((collision) =>
    duplicateSymlinkName(
      workspace.name,
      collision.categoryPath,
      collision.symlinkName,
      collision.repoNames
    )
  );

  return issues.length > 0 ? validationFailure(issues) : validationSuccess();
}

// =============================================================================
// Rule: Category Paths Do Not Cross Links
// =============================================================================

export function validateCategoryPaths(workspace: Workspace): ValidationResult {
  const issues = findCategoryLinkCollisions(workspace).map((collision) =>
    categoryRepoCollision(
      workspace.name,
      collision.categoryPath,
      collision.parentCategory,
      collision.symlinkName
    )
  );

  return issues.length > 0 ? validationFailure(issues) : validationSuccess();
}

// =============================================================================
// Rule: One Category Per Repository
// =============================================================================

/**
 * Having a repository in several categories is allowed; this is informational
 */
export function validateSingleCategoryPerRepo(workspace: Workspace): ValidationResult {
  const locations = new Map<string, string[]>();

  for (const categoryPath of Object.keys(workspace.categories).sort(compareCodeUnits)) {
    const category = workspace.categories[categoryPath];
    if (!category) continue;
    for (const entry of category.entries) {
      const paths = locations.get(entry.repoName) ?? [];
      if (!paths.includes(categoryPath)) {
        paths.push(categoryPath);
      }
      locations.set(entry.repoName, paths);
    }
  }

  const issues: ValidationIssue[] = [];
  for (const repoName of Array.from(locations.keys()).sort(compareCodeUnits)) {
    const paths = locations.get(repoName) ?? [];
    if (paths.length > 1) {
      issues.push(repoInMultipleCategories(workspace.name, repoName, paths));
    }
  }

  return validationFailure(issues);
}

// =============================================================================
// Rule: Repositories Exist
// =============================================================================

export function validateReposInStore(
  workspace: Workspace,
  storeRepos: Set<string>,
  storePath: string
): ValidationResult {
  const issues: ValidationIssue[] = [];

  for (const categoryPath of Object.keys(workspace.categories).sort(compareCodeUnits)) {
    const category = workspace.categories[categoryPath];
    if (!category) continue;
    for (const entry of category.entries) {
      if (!storeRepos.has(entry.repoName)) {
        issues.push(repoNotInStore(workspace.name, categoryPath, entry.repoName, storePath));
      }
    }
  }

  return validationFailure(issues);
}
