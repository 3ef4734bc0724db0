/**
 * Editor workspace files
 *
 * Builds `.code-workspace` JSON listing a workspace's links as folders, with
 * paths relative to the directory the file is written to.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, relative, resolve, sep } from 'node:path';
import type { Category, LinkspaceConfig } from '../../registry/types.js';
import { ConfigError } from '../../registry/types.js';
import {
  compareCodeUnits,
  joinCategoryPath,
  normalizeCategoryPath,
  requireWorkspace,
  symlinkName,
} from '../../registry/model.js';

export interface EditorWorkspaceFolder {
  name: string;
  path: string;
}

export interface EditorWorkspace {
  folders: EditorWorkspaceFolder[];
  settings: Record<string, unknown>;
}

export interface EditorWorkspaceOptions {
  /** Limit the folders to one category */
  categoryPath?: string;
  /** Directory the file will be written to */
  outputDir: string;
}

/**
 * File name for a workspace, or one of its categories
 *
 * @example
 * editorWorkspaceFileName('Projects')                // 'Projects.code-workspace'
 * editorWorkspaceFileName('Projects', '.')           // 'Projects-root.code-workspace'
 * editorWorkspaceFileName('Projects', 'vendor/acme') // 'vendor-acme.code-workspace'
 */
export function editorWorkspaceFileName(workspace: string, categoryPath?: string): string {
  if (categoryPath === undefined) {
    return `${workspace}.code-workspace`;
  }
  const normalized = normalizeCategoryPath(categoryPath);
  if (normalized === '.') {
    return `${workspace}-root.code-workspace`;
  }
  return `${normalized.split('/').join('-')}.code-workspace`;
}

/**
 * Build the editor workspace for a configured workspace
 *
 * Folders are deduplicated by link name (first category in path order wins)
 * and sorted by name.
 *
 * @throws ConfigError (WORKSPACE_NOT_FOUND, CATEGORY_NOT_FOUND)
 */
export function buildEditorWorkspace(
  config: LinkspaceConfig,
  workspaceName: string,
  options: EditorWorkspaceOptions
): EditorWorkspace {
  const workspace = requireWorkspace(config, workspaceName);

  let categories: Category[];
  if (options.categoryPath !== undefined) {
    const path = normalizeCategoryPath(options.categoryPath);
    const category = workspace.categories[path];
    if (!category) {
      const available = Object.keys(workspace.categories).sort(compareCodeUnits);
      throw new ConfigError(
        `Category "${path}" not found in workspace "${workspace.name}". Available: ${available.join(', ') || '(none)'}`,
        'CATEGORY_NOT_FOUND',
        { workspace: workspace.name, category: path, available }
      );
    }
    categories = [category];
  } else {
    categories = Object.keys(workspace.categories)
      .sort(compareCodeUnits)
      .flatMap((path) => {
        const category = workspace.categories[path];
        return category ? [category] : [];
      });
  }

  const prefix = relative(resolve(options.outputDir), workspace.path).split(sep).join('/');
  const seen = new Set<string>();
  const folders: EditorWorkspaceFolder[] = [];

  for (const category of categories) {
    for (const entry of category.entries) {
      const name = symlinkName(entry);
      if (seen.has(name)) continue;
      seen.add(name);

      const linkPath = joinCategoryPath(category.path, name);
      folders.push({ name, path: prefix === '' ? linkPath : `${prefix}/${linkPath}` });
    }
  }

  folders.sort((a, b) => compareCodeUnits(a.name, b.name));
  return { folders, settings: {} };
}

/**
 * Write an editor workspace as pretty-printed JSON
 */
export function writeEditorWorkspace(data: EditorWorkspace, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}
