/**
 * Entry parsing, category-path normalization and model queries
 */

import type {
  Category,
  LinkspaceConfig,
  RepoEntry,
  RepoLocation,
  Workspace,
} from './types.js';
import { ConfigError, ROOT_CATEGORY } from './types.js';

// =============================================================================
// Repo Entries
// =============================================================================

/**
 * Name of the symlink an entry produces
 */
export function symlinkName(entry: RepoEntry): string {
  return entry.alias ?? entry.repoName;
}

/**
 * Parse a `repo` or `repo:alias` declaration.
 *
 * Splits on the last ":", so a repository whose name contains a colon can
 * only be declared together with an alias.
 *
 * @throws ConfigError (INVALID_REPO_ENTRY) for empty names or names with "/"
 */
export function parseRepoEntry(value: string): RepoEntry {
  const trimmed = value.trim();
  const separator = trimmed.lastIndexOf(':');

  const repoName = separator === -1 ? trimmed : trimmed.slice(0, separator);
  const alias = separator === -1 ? undefined : trimmed.slice(separator + 1);

  assertLinkName(repoName, value, 'repository name');
  if (alias !== undefined) {
    assertLinkName(alias, value, 'alias');
  }

  if (alias === undefined || alias === repoName) {
    return { repoName };
  }
  return { repoName, alias };
}

/**
 * Inverse of parseRepoEntry
 */
export function formatRepoEntry(entry: RepoEntry): string {
  if (entry.alias && entry.alias !== entry.repoName) {
    return `${entry.repoName}:${entry.alias}`;
  }
  return entry.repoName;
}

function assertLinkName(name: string, declaration: string, role: string): void {
  if (name === '' || name === '.' || name === '..' || name.includes('/')) {
    throw new ConfigError(
      `Invalid ${role} in "${declaration}": must be a single non-empty path segment`,
      'INVALID_REPO_ENTRY',
      { declaration, role, name }
    );
  }
}

// =============================================================================
// Category Paths
// =============================================================================

/**
 * Normalize a category path.
 *
 * Leading, trailing and repeated "/" are dropped, "." segments vanish, and an
 * empty result becomes the root sentinel ".".
 *
 * @example
 * normalizeCategoryPath('/vendor//acme/') // 'vendor/acme'
 * normalizeCategoryPath('./')            // '.'
 */
export function normalizeCategoryPath(raw: string): string {
  const segments = raw
    .trim()
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');

  if (segments.includes('..')) {
    throw new ConfigError(
      `Invalid category path "${raw}": ".." segments are not allowed`,
      'INVALID_CATEGORY_PATH',
      { path: raw }
    );
  }

  return segments.length === 0 ? ROOT_CATEGORY : segments.join('/');
}

export function isRootCategory(categoryPath: string): boolean {
  return categoryPath === ROOT_CATEGORY;
}

/**
 * Path segments of a normalized category path (none for the root)
 */
export function categorySegments(categoryPath: string): string[] {
  return isRootCategory(categoryPath) ? [] : categoryPath.split('/');
}

/**
 * Workspace-relative path of `name` inside a category
 */
export function joinCategoryPath(categoryPath: string, name: string): string {
  return isRootCategory(categoryPath) ? name : `${categoryPath}/${name}`;
}

/**
 * Display form of a link location: "Projects/tool" rather than "Projects/./tool"
 */
export function formatLinkLocation(
  workspace: string,
  categoryPath: string,
  name: string
): string {
  return `${workspace}/${joinCategoryPath(categoryPath, name)}`;
}

/**
 * Compare two strings by UTF-16 code units; independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// =============================================================================
// Workspace Queries
// =============================================================================

export function getCategory(workspace: Workspace, categoryPath: string): Category | undefined {
  return workspace.categories[normalizeCategoryPath(categoryPath)];
}

export function getOrCreateCategory(workspace: Workspace, categoryPath: string): Category {
  const path = normalizeCategoryPath(categoryPath);
  const existing = workspace.categories[path];
  if (existing) {
    return existing;
  }
  const category: Category = { path, entries: [] };
  workspace.categories[path] = category;
  return category;
}

/**
 * Add an entry to a category.
 *
 * @returns false when the category already holds this exact entry
 * @throws ConfigError (INVALID_REPO_ENTRY) when the link name is taken by another repository
 */
export function addRepoEntry(
  workspace: Workspace,
  categoryPath: string,
  entry: RepoEntry
): boolean {
  const category = getOrCreateCategory(workspace, categoryPath);
  const name = symlinkName(entry);
  const existing = category.entries.find((candidate) => symlinkName(candidate) === name);

  if (existing) {
    if (existing.repoName === entry.repoName) {
      return false;
    }
    throw new ConfigError(
      `Link name "${name}" in ${formatLinkLocation(workspace.name, category.path, '')} is already used by repository "${existing.repoName}"`,
      'INVALID_REPO_ENTRY',
      { workspace: workspace.name, categoryPath: category.path, symlinkName: name }
    );
  }

  category.entries.push(entry.alias ? { repoName: entry.repoName, alias: entry.alias } : { repoName: entry.repoName });
  return true;
}

/**
 * Link names declared in a category
 */
export function categorySymlinkNames(category: Category): Set<string> {
  return new Set(category.entries.map(symlinkName));
}

/**
 * Repository names declared anywhere in a workspace
 */
export function workspaceRepoNames(workspace: Workspace): Set<string> {
  const names = new Set<string>();
  for (const category of Object.values(workspace.categories)) {
    for (const entry of category.entries) {
      names.add(entry.repoName);
    }
  }
  return names;
}

/**
 * Repository names declared anywhere in the configuration
 */
export function allRepoNames(config: LinkspaceConfig): Set<string> {
  const names = new Set<string>();
  for (const workspace of Object.values(config.workspaces)) {
    for (const name of workspaceRepoNames(workspace)) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Every place a repository is declared, across all workspaces
 */
export function findRepoLocations(config: LinkspaceConfig, repoName: string): RepoLocation[] {
  const locations: RepoLocation[] = [];
  for (const workspace of Object.values(config.workspaces)) {
    for (const category of Object.values(workspace.categories)) {
      for (const entry of category.entries) {
        if (entry.repoName === repoName) {
          locations.push({ workspace: workspace.name, categoryPath: category.path, entry });
        }
      }
    }
  }
  return locations;
}

/**
 * Look up a workspace by name.
 *
 * @throws ConfigError (WORKSPACE_NOT_FOUND)
 */
export function requireWorkspace(config: LinkspaceConfig, name: string): Workspace {
  const workspace = config.workspaces[name];
  if (!workspace) {
    const available = Object.keys(config.workspaces).sort(compareCodeUnits);
    throw new ConfigError(
      `Workspace "${name}" not found. Available: ${available.join(', ') || '(none)'}`,
      'WORKSPACE_NOT_FOUND',
      { workspace: name, available }
    );
  }
  return workspace;
}

// =============================================================================
// Structural Collisions
// =============================================================================

/**
 * Two or more repositories wanting the same link name in one category
 */
export interface SymlinkNameCollision {
  categoryPath: string;
  symlinkName: string;
  repoNames: string[];
}

/**
 * A category path segment that is also declared as a link one level up
 */
export interface CategoryLinkCollision {
  categoryPath: string;
  parentCategory: string;
  symlinkName: string;
}

/**
 * Find link names claimed by different repositories within one category
 */
export function findSymlinkNameCollisions(workspace: Workspace): SymlinkNameCollision[] {
  const collisions: SymlinkNameCollision[] = [];
  const categoryPaths = Object.keys(workspace.categories).sort(compareCodeUnits);

  for (const categoryPath of categoryPaths) {
    const category = workspace.categories[categoryPath];
    if (!category) continue;

    const reposByName = new Map<string, Set<string>>();
    for (const entry of category.entries) {
      const name = symlinkName(entry);
      const repos = reposByName.get(name) ?? new Set<string>();
      repos.add(entry.repoName);
      reposByName.set(name, repos);
    }

    const names = Array.from(reposByName.keys()).sort(compareCodeUnits);
    for (const name of names) {
      const repos = reposByName.get(name);
      if (repos && repos.size > 1) {
        collisions.push({
          categoryPath,
          symlinkName: name,
          repoNames: Array.from(repos).sort(compareCodeUnits),
        });
      }
    }
  }

  return collisions;
}

/**
 * Find category paths that would have to be a directory where a link is declared.
 *
 * A root entry "foo" and a category "foo/bar" cannot coexist: "foo" cannot be
 * both a symlink and a directory. Only categories that declare entries count,
 * and only the first clash along each path is reported.
 */
export function findCategoryLinkCollisions(workspace: Workspace): CategoryLinkCollision[] {
  const collisions: CategoryLinkCollision[] = [];
  const categoryPaths = Object.keys(workspace.categories).sort(compareCodeUnits);

  for (const categoryPath of categoryPaths) {
    const category = workspace.categories[categoryPath];
    if (!category || category.entries.length === 0 || isRootCategory(categoryPath)) {
      continue;
    }

    const segments = categorySegments(categoryPath);
    for (let i = 0; i < segments.length; i++) {
      const parentCategory = i === 0 ? ROOT_CATEGORY : segments.slice(0, i).join('/');
      const component = segments[i];
      const parent = workspace.categories[parentCategory];
      if (component !== undefined && parent && categorySymlinkNames(parent).has(component)) {
        collisions.push({ categoryPath, parentCategory, symlinkName: component });
        break;
      }
    }
  }

  return collisions;
}
