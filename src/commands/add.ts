/**
 * add command - Declare one store repository in a category
 */

import { join } from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import {
  addRepoEntry,
  findCategoryLinkCollisions,
  findRepoLocations,
  formatLinkLocation,
  normalizeCategoryPath,
  parseRepoEntry,
  symlinkName,
} from '../registry/model.js';
import { ROOT_CATEGORY } from '../registry/types.js';
import { isRepository } from '../reconcilers/links/scan.js';
import { verbose } from '../utils/output.js';
import { defaultWorkspace, loadContextConfig, saveContextConfig } from './context.js';

export interface AddOptions {
  /** Target workspace (default: the first one) */
  workspace?: string;
  /** Target category (default: the workspace root) */
  category?: string;
  /** Link name to use instead of the repository name */
  alias?: string;
}

export interface AddData {
  workspace: string;
  categoryPath: string;
  repoName: string;
  symlinkName: string;
  saved: boolean;
}

/**
 * Execute the add command
 */
export function addCommand(
  ctx: CommandContext,
  repo: string,
  options: AddOptions = {}
): CommandResult<AddData> {
  const { options: globalOpts } = ctx;
  verbose(`Executing add command for ${repo}`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const workspace = defaultWorkspace(config, options.workspace);
  const entry = parseRepoEntry(options.alias ? `${repo}:${options.alias}` : repo);
  const categoryPath = normalizeCategoryPath(options.category ?? ROOT_CATEGORY);
  const name = symlinkName(entry);
  const location = formatLinkLocation(workspace.name, categoryPath, name);

  if (!isRepository(join(config.storePath, entry.repoName))) {
    return {
      success: false,
      message: `Repository "${entry.repoName}" not found in store ${config.storePath}`,
    };
  }

  const otherLocations = findRepoLocations(config, entry.repoName);
  const collisionsBefore = findCategoryLinkCollisions(workspace).length;

  if (!addRepoEntry(workspace, categoryPath, entry)) {
    return {
      success: true,
      message: `${location} is already declared`,
      data: { workspace: workspace.name, categoryPath, repoName: entry.repoName, symlinkName: name, saved: false },
    };
  }

  if (findCategoryLinkCollisions(workspace).length > collisionsBefore) {
    return {
      success: false,
      message: `Cannot add ${location}: it would collide with a category directory`,
    };
  }

  const warnings = otherLocations.map(
    (other) => `"${entry.repoName}" is also declared at ${formatLinkLocation(other.workspace, other.categoryPath, symlinkName(other.entry))}`
  );

  const saved = saveContextConfig(ctx, config);
  const verb = globalOpts.dryRun ? 'Would add' : 'Added';

  return {
    success: true,
    message: `${verb} ${location} (run "linkspace apply" to create the link)`,
    data: { workspace: workspace.name, categoryPath, repoName: entry.repoName, symlinkName: name, saved },
    warnings,
  };
}
