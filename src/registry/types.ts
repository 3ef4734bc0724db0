/**
 * Entity model for linkspace configuration
 *
 * A configuration names one flat store of repositories and any number of
 * workspaces. Each workspace is a tree of categories; each category lists the
 * repositories that should appear (as symlinks) under that path.
 *
 * @example config.yaml
 * ```yaml
 * store: ~/code
 * Projects:
 *   .: [tool-a, acme-code:git]
 *   vendor/acme: [acme-sdk]
 * ```
 */

// =============================================================================
// Core Types
// =============================================================================

/** Category path sentinel for the workspace root */
export const ROOT_CATEGORY = '.';

/**
 * A repository declared under a category, optionally under another link name
 */
export interface RepoEntry {
  /** Directory name of the repository inside the store */
  repoName: string;
  /** Link name to use instead of the repository name */
  alias?: string;
}

/**
 * An ordered list of entries that live under one category path
 */
export interface Category {
  /** Normalized category path ("." for the workspace root) */
  path: string;
  entries: RepoEntry[];
}

/**
 * A workspace directory holding a tree of symlinks into the store
 */
export interface Workspace {
  /** Basename of the workspace path, unique across the configuration */
  name: string;
  /** Absolute path of the workspace root */
  path: string;
  /** Categories keyed by normalized category path */
  categories: Record<string, Category>;
}

/**
 * In-memory configuration
 */
export interface LinkspaceConfig {
  /** Absolute path of the flat repository store */
  storePath: string;
  /** Where editor workspace files are written by default */
  editorWorkspacesPath?: string;
  /** Workspaces keyed by name */
  workspaces: Record<string, Workspace>;
}

/**
 * A place a repository is declared
 */
export interface RepoLocation {
  workspace: string;
  categoryPath: string;
  entry: RepoEntry;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error raised while loading, parsing or addressing the configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration error codes
 */
export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'CONFIG_INVALID'
  | 'WORKSPACE_NAME_COLLISION'
  | 'WORKSPACE_NOT_FOUND'
  | 'CATEGORY_NOT_FOUND'
  | 'INVALID_REPO_ENTRY'
  | 'INVALID_CATEGORY_PATH';

// =============================================================================
// Loader Options
// =============================================================================

/**
 * Options shared by the loader and serializer
 */
export interface ConfigPathOptions {
  /** Home directory used to expand and abbreviate "~" (default: os.homedir()) */
  home?: string;
}

/**
 * Options for creating a fresh configuration
 */
export interface DefaultConfigOptions extends ConfigPathOptions {
  /** Store path (default: ~/code) */
  storePath?: string;
  /** Workspace paths (default: [~/workspace]) */
  workspacePaths?: string[];
}
