/**
 * linkspace CLI - Keep workspace symlink trees in line with a flat repository store
 *
 * Commands:
 * - init: Write a starter configuration
 * - status: Show what differs between the configuration and the workspaces
 * - apply: Create, relink and (with --prune) remove symlinks
 * - sync: Declare uncategorized store repositories
 * - add: Declare one repository in a category
 * - adopt: Declare the symlinks a workspace already has
 * - validate: Check the configuration for problems
 * - fmt: Rewrite the config file in canonical form
 * - categories: List categories
 * - editor-workspace: Write .code-workspace files
 */

import { homedir } from 'node:os';
import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  addCommand,
  adoptCommand,
  applyCommand,
  categoriesCommand,
  editorWorkspaceCommand,
  fmtCommand,
  initCommand,
  statusCommand,
  syncCommand,
  validateCommand,
} from './commands/index.js';
import { resolveConfigPath } from './config/index.js';
import { ConfigError } from './registry/types.js';
import { logger } from './utils/logger.js';
import { printResult, error, verbose as verboseLog } from './utils/output.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const home = homedir();
  const resolution = resolveConfigPath({ cliPath: options.config, home });

  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
    verboseLog(`Config resolution attempted: ${resolution.attempted.join(' -> ')}`, true);
    verboseLog(`Using ${resolution.path} (via ${resolution.source})`, true);
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    configPath: resolution.path,
    configSource: resolution.source,
    home,
  };
}

/**
 * Run a command handler, print its result and exit
 */
function runCommand<T>(name: string, handler: (ctx: CommandContext) => CommandResult<T>): void {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = handler(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    if (err instanceof ConfigError) {
      printResult({ success: false, message: err.message, errors: [err.code] }, ctx.outputFormat);
      process.exit(1);
    }
    logger.error(`${name} failed`, err instanceof Error ? err : undefined);
    error(`${name} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('linkspace')
  .description('Keep workspace symlink trees in line with a flat repository store')
  .version(VERSION)
  // LINKSPACE_CONFIG is read by resolveConfigPath so the source can be reported
  .addOption(new Option('-c, --config <path>', 'Config file path'))
  .addOption(
    new Option('-n, --dry-run', 'Show what would happen without making changes')
      .default(false)
  )
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

interface InitCmdOpts {
  store?: string;
  workspace?: string[];
  scan?: boolean;
  force?: boolean;
}

program
  .command('init')
  .description('Write a starter configuration')
  .option('--store <path>', 'Repository store directory (default: ~/code)')
  .option('-w, --workspace <path...>', 'Workspace directories (default: ~/workspace)')
  .option('--scan', 'Declare every store repository at the root of the first workspace')
  .option('-f, --force', 'Overwrite an existing config file')
  .action((cmdOpts: InitCmdOpts) => {
    runCommand('Init', (ctx) => initCommand(ctx, cmdOpts));
  });

interface WorkspaceCmdOpts {
  workspace?: string;
}

program
  .command('status')
  .description('Show what differs between the configuration and the workspaces')
  .option('-w, --workspace <name>', 'Only this workspace')
  .action((cmdOpts: WorkspaceCmdOpts) => {
    runCommand('Status', (ctx) => statusCommand(ctx, cmdOpts));
  });

interface ApplyCmdOpts {
  workspace?: string;
  prune?: boolean;
  force?: boolean;
}

program
  .command('apply')
  .description('Create and fix symlinks so the workspaces match the configuration')
  .option('-w, --workspace <name>', 'Only this workspace')
  .option('--prune', 'Remove symlinks that are not declared')
  .option('-f, --force', 'Apply non-conflicting changes even when conflicts exist')
  .action((cmdOpts: ApplyCmdOpts) => {
    runCommand('Apply', (ctx) => applyCommand(ctx, cmdOpts));
  });

program
  .command('sync')
  .description('Declare store repositories that are in no workspace')
  .option('-w, --workspace <name>', 'Workspace that receives them (default: first)')
  .action((cmdOpts: WorkspaceCmdOpts) => {
    runCommand('Sync', (ctx) => syncCommand(ctx, cmdOpts));
  });

interface AddCmdOpts {
  workspace?: string;
  category?: string;
  alias?: string;
}

program
  .command('add')
  .description('Declare a store repository in a category')
  .argument('<repo>', 'Repository name, optionally "repo:alias"')
  .option('-w, --workspace <name>', 'Target workspace (default: first)')
  .option('-C, --category <path>', 'Target category (default: workspace root)')
  .option('-a, --alias <name>', 'Link name to use instead of the repository name')
  .action((repo: string, cmdOpts: AddCmdOpts) => {
    runCommand('Add', (ctx) => addCommand(ctx, repo, cmdOpts));
  });

program
  .command('adopt')
  .description('Declare the symlinks a workspace already has')
  .option('-w, --workspace <name>', 'Only this workspace')
  .action((cmdOpts: WorkspaceCmdOpts) => {
    runCommand('Adopt', (ctx) => adoptCommand(ctx, cmdOpts));
  });

program
  .command('validate')
  .description('Check the configuration and workspaces for problems')
  .action(() => {
    runCommand('Validate', (ctx) => validateCommand(ctx));
  });

program
  .command('fmt')
  .description('Rewrite the config file in canonical form')
  .option('--check', 'Fail if the file is not formatted, without writing')
  .action((cmdOpts: { check?: boolean }) => {
    runCommand('Fmt', (ctx) => fmtCommand(ctx, cmdOpts));
  });

program
  .command('categories')
  .description('List categories and their entry counts')
  .option('-w, --workspace <name>', 'Only this workspace')
  .action((cmdOpts: WorkspaceCmdOpts) => {
    runCommand('Categories', (ctx) => categoriesCommand(ctx, cmdOpts));
  });

interface EditorWorkspaceCmdOpts {
  workspace?: string;
  category?: string;
  out?: string;
}

program
  .command('editor-workspace')
  .description('Write .code-workspace files listing workspace links')
  .option('-w, --workspace <name>', 'Only this workspace')
  .option('-C, --category <path>', 'Only the links of this category')
  .option('-o, --out <dir>', 'Output directory (default: editor_workspaces from the config)')
  .action((cmdOpts: EditorWorkspaceCmdOpts) => {
    runCommand('Editor workspace', (ctx) => editorWorkspaceCommand(ctx, cmdOpts));
  });

// Parse and run
program.parse();
