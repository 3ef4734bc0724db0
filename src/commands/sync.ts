/**
 * sync command - Declare uncategorized store repositories
 *
 * Repositories present in the store but missing from every workspace are added
 * to the root category of the target workspace. Links are not created; run
 * apply afterwards.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { addRepoEntry } from '../registry/model.js';
import { ConfigError, ROOT_CATEGORY } from '../registry/types.js';
import { info, verbose } from '../utils/output.js';
import {
  defaultWorkspace,
  inspectStoreState,
  loadContextConfig,
  plural,
  saveContextConfig,
  uncategorizedRepos,
} from './context.js';

export interface SyncOptions {
  /** Workspace that receives the new entries (default: the first one) */
  workspace?: string;
}

export interface SyncData {
  workspace: string;
  added: string[];
  saved: boolean;
}

/**
 * Execute the sync command
 */
export function syncCommand(
  ctx: CommandContext,
  options: SyncOptions = {}
): CommandResult<SyncData> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Executing sync command`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const workspace = defaultWorkspace(config, options.workspace);
  const store = inspectStoreState(config);
  const candidates = uncategorizedRepos(config, store.repos);

  if (candidates.length === 0) {
    return {
      success: true,
      message: 'All repos are categorized',
      data: { workspace: workspace.name, added: [], saved: false },
    };
  }

  const added: string[] = [];
  const warnings: string[] = [];
  for (const repo of candidates) {
    try {
      if (addRepoEntry(workspace, ROOT_CATEGORY, { repoName: repo })) {
        added.push(repo);
      }
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      warnings.push(err.message);
    }
  }

  const saved = added.length > 0 && saveContextConfig(ctx, config);

  if (outputFormat === 'human') {
    for (const repo of added) {
      info(`+ ${workspace.name}/${repo}`);
    }
  }

  const verb = globalOpts.dryRun ? 'Would add' : 'Added';
  return {
    success: true,
    message: `${verb} ${plural(added.length, 'repo')} to ${workspace.name} (run "linkspace apply" to create links)`,
    data: { workspace: workspace.name, added, saved },
    warnings,
  };
}
