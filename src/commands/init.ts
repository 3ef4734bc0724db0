/**
 * init command - Write a starter configuration
 */

import { existsSync, mkdirSync } from 'node:fs';
import type { CommandContext, CommandResult } from '../types.js';
import { createDefaultConfig, saveConfig } from '../registry/loader.js';
import { addRepoEntry } from '../registry/model.js';
import { ROOT_CATEGORY } from '../registry/types.js';
import { validateConfigRules } from '../registry/validator.js';
import { scanStore } from '../reconcilers/links/scan.js';
import { info, verbose } from '../utils/output.js';
import { plural } from './context.js';

export interface InitOptions {
  /** Store directory (default: ~/code) */
  store?: string;
  /** Workspace directories (default: ~/workspace) */
  workspace?: string[];
  /** Declare every store repository at the root of the first workspace */
  scan?: boolean;
  /** Overwrite an existing config file */
  force?: boolean;
}

export interface InitData {
  configPath: string;
  storePath: string;
  workspaces: string[];
  declared: number;
}

/**
 * Execute the init command
 */
export function initCommand(
  ctx: CommandContext,
  options: InitOptions = {}
): CommandResult<InitData> {
  const { options: globalOpts, outputFormat } = ctx;

  if (existsSync(ctx.configPath) && !options.force) {
    return {
      success: false,
      message: `Config already exists at ${ctx.configPath} (use --force to overwrite)`,
    };
  }

  const config = createDefaultConfig({
    home: ctx.home,
    storePath: options.store,
    workspacePaths: options.workspace && options.workspace.length > 0 ? options.workspace : undefined,
  });

  let declared = 0;
  const first = Object.values(config.workspaces)[0];
  if (options.scan && first) {
    for (const repo of scanStore(config.storePath)) {
      if (addRepoEntry(first, ROOT_CATEGORY, { repoName: repo })) {
        declared++;
      }
    }
    verbose(`Declared ${declared} store repositories in ${first.name}`, globalOpts.verbose);
  }

  const validation = validateConfigRules(config);
  const data: InitData = {
    configPath: ctx.configPath,
    storePath: config.storePath,
    workspaces: Object.keys(config.workspaces),
    declared,
  };

  if (globalOpts.dryRun) {
    return {
      success: true,
      message: `Would write ${ctx.configPath}`,
      data,
      warnings: validation.warnings.map((issue) => issue.message),
    };
  }

  if (!existsSync(config.storePath)) {
    mkdirSync(config.storePath, { recursive: true });
    if (outputFormat === 'human') {
      info(`Created store directory ${config.storePath}`);
    }
  }

  saveConfig(config, ctx.configPath, { home: ctx.home });

  const suffix = options.scan ? ` with ${plural(declared, 'repo')}` : '';
  return {
    success: true,
    message: `Created ${ctx.configPath}${suffix}`,
    data,
    warnings: validation.warnings
      .filter((issue) => issue.code !== 'STORE_NOT_FOUND')
      .map((issue) => issue.message),
  };
}
