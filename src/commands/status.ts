/**
 * status command - Compare the store, the configuration and the workspaces
 */

import type { CommandContext, CommandResult } from '../types.js';
import { allRepoNames, compareCodeUnits } from '../registry/model.js';
import type { Conflict, LinkAction, OrphanLink, WorkspacePlan } from '../reconcilers/links/types.js';
import { header, info, printPlan, verbose, warn } from '../utils/output.js';
import {
  inspectStoreState,
  loadContextConfig,
  planWorkspaces,
  plural,
  selectWorkspaces,
  uncategorizedRepos,
} from './context.js';

export interface StatusOptions {
  /** Limit to one workspace */
  workspace?: string;
}

export interface WorkspaceStatus {
  workspace: string;
  root: string;
  exists: boolean;
  summary: WorkspacePlan['summary'];
  actions: LinkAction[];
  conflicts: Conflict[];
  warnings: string[];
  orphans: OrphanLink[];
  /** Real repository clones sitting inside the workspace */
  unmanaged: string[];
}

export interface StatusData {
  storePath: string;
  storeExists: boolean;
  /** Store repositories not declared anywhere */
  uncategorized: string[];
  /** Declared repositories missing from the store */
  missing: string[];
  /** Store directories that are not repositories */
  nonRepos: string[];
  /** Store entries that resolve to an already-listed repository */
  duplicates: string[];
  workspaces: WorkspaceStatus[];
}

/**
 * Execute the status command
 */
export function statusCommand(
  ctx: CommandContext,
  options: StatusOptions = {}
): CommandResult<StatusData> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Executing status command`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const store = inspectStoreState(config);
  const storeRepoSet = new Set(store.repos);

  const uncategorized = uncategorizedRepos(config, store.repos);
  const missing = Array.from(allRepoNames(config))
    .filter((repo) => !storeRepoSet.has(repo))
    .sort(compareCodeUnits);

  const reconciled = planWorkspaces(selectWorkspaces(config, options.workspace), store, { prune: false });
  const workspaces: WorkspaceStatus[] = reconciled.map(({ snapshot, plan }) => ({
    workspace: plan.workspace,
    root: plan.root,
    exists: snapshot.exists,
    summary: plan.summary,
    actions: plan.actions,
    conflicts: plan.conflicts,
    warnings: plan.warnings,
    orphans: plan.orphans,
    unmanaged: snapshot.entries.filter((entry) => entry.kind === 'repository').map((entry) => entry.path),
  }));

  const data: StatusData = {
    storePath: store.storePath,
    storeExists: store.storeRealPath !== undefined,
    uncategorized,
    missing,
    nonRepos: store.nonRepos,
    duplicates: store.duplicates,
    workspaces,
  };

  if (outputFormat === 'human') {
    printStatus(data, reconciled.map((r) => r.plan));
  }

  const pending = workspaces.reduce(
    (sum, ws) => sum + ws.summary.toCreate + ws.summary.toRelink + ws.summary.toRemove,
    0
  );
  const conflicts = workspaces.reduce((sum, ws) => sum + ws.summary.conflicts, 0);

  const parts: string[] = [];
  if (pending > 0) parts.push(`${plural(pending, 'pending change')}`);
  if (conflicts > 0) parts.push(`${plural(conflicts, 'conflict')}`);
  if (uncategorized.length > 0) parts.push(`${uncategorized.length} uncategorized`);
  if (missing.length > 0) parts.push(`${missing.length} missing from store`);

  return {
    success: true,
    message: parts.length === 0 ? 'Everything is in sync' : parts.join(', '),
    data,
  };
}

function printStatus(data: StatusData, plans: WorkspacePlan[]): void {
  header('Store');
  info(`${data.storePath}${data.storeExists ? '' : ' (missing)'}`);

  if (data.uncategorized.length > 0) {
    warn(`Uncategorized: ${data.uncategorized.join(', ')}`);
  }
  if (data.missing.length > 0) {
    warn(`Declared but not in store: ${data.missing.join(', ')}`);
  }
  if (data.nonRepos.length > 0) {
    info(`Not repositories: ${data.nonRepos.join(', ')}`);
  }
  if (data.duplicates.length > 0) {
    warn(`Duplicate store entries ignored: ${data.duplicates.join(', ')}`);
  }

  header('Workspaces');
  for (const plan of plans) {
    printPlan(plan, { showUnchanged: true });
    const status = data.workspaces.find((ws) => ws.workspace === plan.workspace);
    for (const path of status?.unmanaged ?? []) {
      warn(`Repository clone inside workspace: ${plan.workspace}/${path}`);
    }
  }
}
