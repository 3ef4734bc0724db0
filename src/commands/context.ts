/**
 * Shared command plumbing: configuration loading, workspace selection and
 * per-workspace planning
 */

import type { CommandContext } from '../types.js';
import type { LinkspaceConfig, Workspace } from '../registry/types.js';
import { loadConfig, saveConfig } from '../registry/loader.js';
import { allRepoNames, compareCodeUnits, requireWorkspace } from '../registry/model.js';
import { inspectStore, scanWorkspace, tryRealpath } from '../reconcilers/links/scan.js';
import { reconcileWorkspace } from '../reconcilers/links/diff.js';
import type { StoreInventory, WorkspacePlan, WorkspaceSnapshot } from '../reconcilers/links/types.js';
import { ConfigError } from '../registry/types.js';
import { verbose } from '../utils/output.js';

/**
 * Load the configuration the context points at
 */
export function loadContextConfig(ctx: CommandContext): LinkspaceConfig {
  verbose(`Loading config from ${ctx.configPath} (via ${ctx.configSource})`, ctx.options.verbose);
  return loadConfig(ctx.configPath, { home: ctx.home });
}

/**
 * Save the configuration unless this is a dry run
 *
 * @returns whether the file was written
 */
export function saveContextConfig(ctx: CommandContext, config: LinkspaceConfig): boolean {
  if (ctx.options.dryRun) {
    verbose(`Dry run: not writing ${ctx.configPath}`, ctx.options.verbose);
    return false;
  }
  saveConfig(config, ctx.configPath, { home: ctx.home });
  return true;
}

/**
 * One named workspace, or every workspace in declaration order
 */
export function selectWorkspaces(config: LinkspaceConfig, name?: string): Workspace[] {
  if (name !== undefined) {
    return [requireWorkspace(config, name)];
  }
  return Object.values(config.workspaces);
}

/**
 * The named workspace, or the first declared one
 *
 * @throws ConfigError (WORKSPACE_NOT_FOUND) when the configuration has none
 */
export function defaultWorkspace(config: LinkspaceConfig, name?: string): Workspace {
  if (name !== undefined) {
    return requireWorkspace(config, name);
  }
  const first = Object.values(config.workspaces)[0];
  if (!first) {
    throw new ConfigError(
      'No workspaces configured. Add one to the config file or run "linkspace init -w <path>"',
      'WORKSPACE_NOT_FOUND'
    );
  }
  return first;
}

/**
 * Store inventory plus the store's canonical path
 */
export interface StoreState extends StoreInventory {
  storePath: string;
  storeRealPath?: string;
}

export function inspectStoreState(config: LinkspaceConfig): StoreState {
  const state: StoreState = { storePath: config.storePath, ...inspectStore(config.storePath) };
  const realPath = tryRealpath(config.storePath);
  if (realPath !== undefined) {
    state.storeRealPath = realPath;
  }
  return state;
}

/**
 * A scanned and diffed workspace
 */
export interface WorkspaceReconciliation {
  workspace: Workspace;
  snapshot: WorkspaceSnapshot;
  plan: WorkspacePlan;
}

/**
 * Scan and diff each workspace against the store
 */
export function planWorkspaces(
  workspaces: Workspace[],
  store: StoreState,
  options: { prune?: boolean } = {}
): WorkspaceReconciliation[] {
  return workspaces.map((workspace) => {
    const snapshot = scanWorkspace(workspace.path, workspace.name);
    const plan = reconcileWorkspace({
      workspace,
      storePath: store.storePath,
      storeRealPath: store.storeRealPath,
      storeRepos: store.repos,
      snapshot,
      prune: options.prune ?? false,
    });
    return { workspace, snapshot, plan };
  });
}

/**
 * Store repositories not declared in any workspace, sorted
 */
export function uncategorizedRepos(config: LinkspaceConfig, storeRepos: string[]): string[] {
  const declared = allRepoNames(config);
  return storeRepos.filter((repo) => !declared.has(repo)).sort(compareCodeUnits);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
