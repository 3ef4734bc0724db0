/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ValidationIssue } from '../registry/errors.js';
import type { Conflict, LinkAction, WorkspacePlan } from '../reconcilers/links/types.js';
import { describeAction, describeConflict } from '../reconcilers/links/diff.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a workspace plan: actions, conflicts and warnings
 */
export function printPlan(plan: WorkspacePlan, options: { showUnchanged?: boolean } = {}): void {
  console.log(chalk.bold(`\n${plan.workspace}`), chalk.gray(`(${plan.root})`));

  if (!plan.hasChanges && plan.conflicts.length === 0) {
    console.log(chalk.gray(`  In sync (${plan.summary.unchanged} link(s))`));
  }

  for (const action of plan.actions) {
    const color = getActionColor(action.kind);
    console.log(color(`  ${getActionIcon(action.kind)} ${describeAction(action)}`));
  }

  printConflicts(plan.conflicts);

  for (const warning of plan.warnings) {
    console.log(chalk.yellow('  ⚠'), warning);
  }

  if (options.showUnchanged && plan.hasChanges) {
    console.log(chalk.gray(`  = ${plan.summary.unchanged} unchanged`));
  }
}

/**
 * Print conflicts, one per line
 */
export function printConflicts(conflicts: Conflict[]): void {
  for (const conflict of conflicts) {
    console.log(chalk.red(`  ✗ ${describeConflict(conflict)}`));
  }
}

/**
 * Print validation issues with their suggestions
 */
export function printValidation(issues: ValidationIssue[]): void {
  for (const issue of issues) {
    const icon = issue.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
    console.log(icon, chalk.gray(`[${issue.code}]`), issue.message);
    for (const suggestion of issue.suggestions ?? []) {
      console.log(chalk.gray(`    • ${suggestion}`));
    }
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getActionIcon(kind: LinkAction['kind']): string {
  switch (kind) {
    case 'create':
      return '+';
    case 'remove':
      return '-';
    case 'relink':
      return '~';
  }
}

function getActionColor(kind: LinkAction['kind']): typeof chalk.green {
  switch (kind) {
    case 'create':
      return chalk.green;
    case 'remove':
      return chalk.red;
    case 'relink':
      return chalk.yellow;
  }
}
