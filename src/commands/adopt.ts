/**
 * adopt command - Declare the symlinks a workspace already has
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { Workspace } from '../registry/types.js';
import { addRepoEntry, categorySymlinkNames, formatRepoEntry, getCategory, symlinkName } from '../registry/model.js';
import { adoptWorkspace } from '../reconcilers/links/adopt.js';
import type { AdoptedEntry } from '../reconcilers/links/types.js';
import { info, verbose } from '../utils/output.js';
import { loadContextConfig, plural, saveContextConfig, selectWorkspaces } from './context.js';

export interface AdoptOptions {
  /** Limit to one workspace */
  workspace?: string;
}

export interface AdoptMergeResult {
  added: AdoptedEntry[];
  /** Candidates whose location is already declared */
  skipped: AdoptedEntry[];
}

export interface AdoptData {
  workspaces: Array<{ workspace: string; added: string[]; skipped: string[] }>;
  saved: boolean;
}

/**
 * Merge adopted entries into a workspace.
 *
 * A candidate is skipped when its category already declares a link of the same
 * name, whatever repository that entry names; the configuration wins.
 */
export function mergeAdoptedEntries(workspace: Workspace, entries: AdoptedEntry[]): AdoptMergeResult {
  const added: AdoptedEntry[] = [];
  const skipped: AdoptedEntry[] = [];

  for (const candidate of entries) {
    const category = getCategory(workspace, candidate.categoryPath);
    if (category && categorySymlinkNames(category).has(symlinkName(candidate.entry))) {
      skipped.push(candidate);
      continue;
    }
    addRepoEntry(workspace, candidate.categoryPath, candidate.entry);
    added.push(candidate);
  }

  return { added, skipped };
}

/**
 * Execute the adopt command
 */
export function adoptCommand(
  ctx: CommandContext,
  options: AdoptOptions = {}
): CommandResult<AdoptData> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Executing adopt command`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const warnings: string[] = [];
  const perWorkspace: AdoptData['workspaces'] = [];
  let total = 0;

  for (const workspace of selectWorkspaces(config, options.workspace)) {
    const adoption = adoptWorkspace(workspace.path, workspace.name, config.storePath);
    warnings.push(...adoption.warnings);

    const merged = mergeAdoptedEntries(workspace, adoption.entries);
    total += merged.added.length;
    perWorkspace.push({
      workspace: workspace.name,
      added: merged.added.map((candidate) => candidate.path),
      skipped: merged.skipped.map((candidate) => candidate.path),
    });

    if (outputFormat === 'human') {
      for (const candidate of merged.added) {
        info(`+ ${workspace.name}/${candidate.path} (${formatRepoEntry(candidate.entry)})`);
      }
    }
  }

  const saved = total > 0 && saveContextConfig(ctx, config);
  const verb = globalOpts.dryRun ? 'Would adopt' : 'Adopted';

  return {
    success: true,
    message: total === 0 ? 'No new symlinks to adopt' : `${verb} ${plural(total, 'symlink')}`,
    data: { workspaces: perWorkspace, saved },
    warnings,
  };
}
