/**
 * categories command - List the categories of a workspace
 */

import type { CommandContext, CommandResult } from '../types.js';
import { compareCodeUnits } from '../registry/model.js';
import { header } from '../utils/output.js';
import { loadContextConfig, plural, selectWorkspaces } from './context.js';

export interface CategoriesOptions {
  /** Limit to one workspace */
  workspace?: string;
}

export interface CategoryListing {
  workspace: string;
  categoryPath: string;
  entries: number;
}

/**
 * Execute the categories command
 */
export function categoriesCommand(
  ctx: CommandContext,
  options: CategoriesOptions = {}
): CommandResult<CategoryListing[]> {
  const config = loadContextConfig(ctx);
  const listings: CategoryListing[] = [];

  for (const workspace of selectWorkspaces(config, options.workspace)) {
    const paths = Object.keys(workspace.categories).sort(compareCodeUnits);
    if (ctx.outputFormat === 'human') {
      header(workspace.name);
    }
    for (const categoryPath of paths) {
      const entries = workspace.categories[categoryPath]?.entries.length ?? 0;
      listings.push({ workspace: workspace.name, categoryPath, entries });
      if (ctx.outputFormat === 'human') {
        console.log(`  ${categoryPath.padEnd(32)} ${plural(entries, 'repo')}`);
      }
    }
  }

  return {
    success: true,
    message: listings.length === 0 ? 'No categories' : `${listings.length} ${listings.length === 1 ? 'category' : 'categories'}`,
    data: listings,
  };
}
