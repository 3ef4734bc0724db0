/**
 * fmt command - Rewrite the config file in canonical form
 */

import { readFileSync } from 'node:fs';
import type { CommandContext, CommandResult } from '../types.js';
import { stringifyConfig } from '../registry/loader.js';
import { loadContextConfig, saveContextConfig } from './context.js';

export interface FmtOptions {
  /** Report whether formatting is needed without writing; fails if it is */
  check?: boolean;
}

export interface FmtData {
  configPath: string;
  changed: boolean;
}

/**
 * Execute the fmt command
 */
export function fmtCommand(ctx: CommandContext, options: FmtOptions = {}): CommandResult<FmtData> {
  const config = loadContextConfig(ctx);
  const current = readFileSync(ctx.configPath, 'utf-8');
  const formatted = stringifyConfig(config, { home: ctx.home });

  if (current === formatted) {
    return {
      success: true,
      message: `${ctx.configPath} is already formatted`,
      data: { configPath: ctx.configPath, changed: false },
    };
  }

  if (options.check || ctx.options.dryRun) {
    return {
      success: !options.check,
      message: `Would format ${ctx.configPath}`,
      data: { configPath: ctx.configPath, changed: true },
    };
  }

  saveContextConfig(ctx, config);
  return {
    success: true,
    message: `Formatted ${ctx.configPath}`,
    data: { configPath: ctx.configPath, changed: true },
  };
}
