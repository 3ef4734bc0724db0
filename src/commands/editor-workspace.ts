/**
 * editor-workspace command - Write .code-workspace files for workspaces
 */

import { join, resolve } from 'node:path';
import type { CommandContext, CommandResult } from '../types.js';
import {
  buildEditorWorkspace,
  editorWorkspaceFileName,
  writeEditorWorkspace,
} from '../reconcilers/editor/index.js';
import { info, verbose } from '../utils/output.js';
import { defaultWorkspace, loadContextConfig, plural, selectWorkspaces } from './context.js';

export interface EditorWorkspaceCommandOptions {
  /** Limit to one workspace */
  workspace?: string;
  /** Only the links of this category (uses the named or first workspace) */
  category?: string;
  /** Output directory (default: editor_workspaces from the config) */
  out?: string;
}

export interface EditorWorkspaceFile {
  workspace: string;
  path: string;
  folders: number;
}

/**
 * Execute the editor-workspace command
 */
export function editorWorkspaceCommand(
  ctx: CommandContext,
  options: EditorWorkspaceCommandOptions = {}
): CommandResult<EditorWorkspaceFile[]> {
  const { options: globalOpts, outputFormat } = ctx;
  const config = loadContextConfig(ctx);

  const outputDir = options.out !== undefined ? resolve(options.out) : config.editorWorkspacesPath;
  if (outputDir === undefined) {
    return {
      success: false,
      message: 'No output directory: pass --out or set "editor_workspaces" in the config',
    };
  }
  verbose(`Writing editor workspaces to ${outputDir}`, globalOpts.verbose);

  const workspaces = options.category !== undefined
    ? [defaultWorkspace(config, options.workspace)]
    : selectWorkspaces(config, options.workspace);

  const files: EditorWorkspaceFile[] = [];
  for (const workspace of workspaces) {
    const data = buildEditorWorkspace(config, workspace.name, {
      categoryPath: options.category,
      outputDir,
    });
    const path = join(outputDir, editorWorkspaceFileName(workspace.name, options.category));
    if (!globalOpts.dryRun) {
      writeEditorWorkspace(data, path);
    }
    files.push({ workspace: workspace.name, path, folders: data.folders.length });

    if (outputFormat === 'human') {
      info(`${path} (${plural(data.folders.length, 'folder')})`);
    }
  }

  const verb = globalOpts.dryRun ? 'Would write' : 'Wrote';
  return {
    success: true,
    message: `${verb} ${plural(files.length, 'editor workspace')}`,
    data: files,
  };
}
