/**
 * apply command - Make the workspaces match the configuration
 */

import type { CommandContext, CommandResult } from '../types.js';
import { applyPlan } from '../reconcilers/links/apply.js';
import { describeConflict } from '../reconcilers/links/diff.js';
import type { ApplyResult } from '../reconcilers/links/types.js';
import { logger } from '../utils/logger.js';
import { dryRunNotice, header, info, printPlan, verbose } from '../utils/output.js';
import {
  inspectStoreState,
  loadContextConfig,
  planWorkspaces,
  plural,
  selectWorkspaces,
} from './context.js';

export interface ApplyCommandOptions {
  /** Limit to one workspace */
  workspace?: string;
  /** Remove symlinks that are not declared */
  prune?: boolean;
  /** Apply the non-conflicting actions even when conflicts exist */
  force?: boolean;
}

export interface ApplyCommandData {
  dryRun: boolean;
  results: ApplyResult[];
  summary: {
    created: number;
    relinked: number;
    removed: number;
    failed: number;
  };
}

/**
 * Execute the apply command
 */
export function applyCommand(
  ctx: CommandContext,
  options: ApplyCommandOptions = {}
): CommandResult<ApplyCommandData> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Executing apply command (prune: ${options.prune ?? false})`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const store = inspectStoreState(config);
  const reconciled = planWorkspaces(selectWorkspaces(config, options.workspace), store, {
    prune: options.prune ?? false,
  });
  const plans = reconciled.map((r) => r.plan);

  if (outputFormat === 'human') {
    if (globalOpts.dryRun) {
      dryRunNotice();
    }
    header('Plan');
    for (const plan of plans) {
      printPlan(plan);
    }
  }

  const warnings = plans.flatMap((plan) => plan.warnings);
  const conflicts = plans.flatMap((plan) =>
    plan.conflicts.map((conflict) => `${plan.workspace}: ${describeConflict(conflict)}`)
  );

  if (conflicts.length > 0 && !options.force) {
    return {
      success: false,
      message: `${plural(conflicts.length, 'conflict')} found; fix the configuration or use --force`,
      errors: conflicts,
      warnings,
    };
  }

  const summary = { created: 0, relinked: 0, removed: 0, failed: 0 };
  const emptyData: ApplyCommandData = { dryRun: globalOpts.dryRun, results: [], summary };

  if (!plans.some((plan) => plan.hasChanges)) {
    return {
      success: true,
      message: 'Nothing to do - everything is in sync',
      data: emptyData,
      warnings: [...conflicts, ...warnings],
    };
  }

  const results = plans.map((plan) =>
    applyPlan(plan, { dryRun: globalOpts.dryRun, logger })
  );

  for (const result of results) {
    summary.created += result.summary.created;
    summary.relinked += result.summary.relinked;
    summary.removed += result.summary.removed;
    summary.failed += result.summary.failed;
    if (outputFormat === 'human') {
      for (const dir of result.removedDirectories) {
        info(`${globalOpts.dryRun ? 'Would remove' : 'Removed'} empty directory ${result.workspace}/${dir}`);
      }
    }
  }

  const errors = results.flatMap((result) => result.errors);
  const verb = globalOpts.dryRun ? 'Would apply' : 'Applied';
  const counts = `${summary.created} created, ${summary.relinked} relinked, ${summary.removed} removed`;

  return {
    success: errors.length === 0,
    message: errors.length === 0
      ? `${verb}: ${counts}`
      : `${verb} with ${plural(summary.failed, 'failure')}: ${counts}`,
    data: { dryRun: globalOpts.dryRun, results, summary },
    errors,
    warnings: [...conflicts, ...warnings],
  };
}
