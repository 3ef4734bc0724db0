/**
 * validate command - Check the configuration and the workspaces for problems
 */

import type { CommandContext, CommandResult } from '../types.js';
import { type ValidationIssue, mergeValidationResults, pathObstruction, validationFailure } from '../registry/errors.js';
import { joinCategoryPath } from '../registry/model.js';
import { validateConfigRules } from '../registry/validator.js';
import { printValidation, verbose } from '../utils/output.js';
import { inspectStoreState, loadContextConfig, planWorkspaces, plural } from './context.js';

export interface ValidateData {
  valid: boolean;
  issues: ValidationIssue[];
}

/**
 * Execute the validate command
 */
export function validateCommand(ctx: CommandContext): CommandResult<ValidateData> {
  const { options: globalOpts, outputFormat } = ctx;
  verbose(`Executing validate command`, globalOpts.verbose);

  const config = loadContextConfig(ctx);
  const store = inspectStoreState(config);
  const rules = validateConfigRules(config, { storeRepos: store.repos });

  const obstructions: ValidationIssue[] = [];
  for (const { plan } of planWorkspaces(Object.values(config.workspaces), store)) {
    for (const conflict of plan.conflicts) {
      if (conflict.kind === 'path-obstruction') {
        obstructions.push(
          pathObstruction(
            plan.workspace,
            conflict.path,
            conflict.obstruction,
            joinCategoryPath(conflict.categoryPath, conflict.symlinkName)
          )
        );
      }
    }
  }

  const result = mergeValidationResults(rules, validationFailure(obstructions));

  if (outputFormat === 'human') {
    printValidation(result.issues);
  }

  const counts = `${plural(result.errors.length, 'error')}, ${plural(result.warnings.length, 'warning')}`;
  return {
    success: result.valid,
    message: result.valid ? `Configuration is valid (${counts})` : `Configuration is invalid (${counts})`,
    data: { valid: result.valid, issues: result.issues },
    errors: result.errors.map((issue) => issue.message),
    warnings: result.warnings.map((issue) => issue.message),
  };
}
