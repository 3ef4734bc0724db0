/**
 * Command exports
 */

export { initCommand, type InitOptions, type InitData } from './init.js';
export { statusCommand, type StatusOptions, type StatusData, type WorkspaceStatus } from './status.js';
export { applyCommand, type ApplyCommandOptions, type ApplyCommandData } from './apply.js';
export { syncCommand, type SyncOptions, type SyncData } from './sync.js';
export { addCommand, type AddOptions, type AddData } from './add.js';
export {
  adoptCommand,
  mergeAdoptedEntries,
  type AdoptOptions,
  type AdoptData,
  type AdoptMergeResult,
} from './adopt.js';
export { validateCommand, type ValidateData } from './validate.js';
export { fmtCommand, type FmtOptions, type FmtData } from './fmt.js';
export { categoriesCommand, type CategoriesOptions, type CategoryListing } from './categories.js';
export {
  editorWorkspaceCommand,
  type EditorWorkspaceCommandOptions,
  type EditorWorkspaceFile,
} from './editor-workspace.js';
