/**
 * Configuration YAML loading and saving
 *
 * Top-level keys other than `store` and `editor_workspaces` are workspaces.
 * A bare key such as `Projects` means `~/Projects`; keys starting with `~` or
 * `/` are paths. Each workspace maps category paths to `repo` or
 * `repo:alias` lists.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type {
  Category,
  ConfigPathOptions,
  DefaultConfigOptions,
  LinkspaceConfig,
  RepoEntry,
  Workspace,
} from './types.js';
import { ConfigError } from './types.js';
import { compareCodeUnits, formatRepoEntry, normalizeCategoryPath, parseRepoEntry } from './model.js';

const STORE_KEY = 'store';
const EDITOR_WORKSPACES_KEY = 'editor_workspaces';
const LEGACY_WORKSPACES_KEY = 'workspaces';

/** Keys that never name a workspace */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([STORE_KEY, EDITOR_WORKSPACES_KEY]);

const DEFAULT_STORE = '~/code';

// =============================================================================
// Paths
// =============================================================================

/**
 * Default configuration file location
 */
export function defaultConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'linkspace', 'config.yaml');
}

/**
 * Expand a leading "~" and make the path absolute
 */
export function expandPath(path: string, home: string = homedir()): string {
  if (path === '~') {
    return resolve(home);
  }
  if (path.startsWith('~/')) {
    return resolve(home, path.slice(2));
  }
  return resolve(path);
}

/**
 * Shorten a path under home to "~/..." for display and serialization
 */
export function abbreviatePath(path: string, home: string = homedir()): string {
  const rel = relative(home, path);
  if (rel === '') {
    return '~';
  }
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return path;
  }
  return `~/${rel.split(sep).join('/')}`;
}

function workspaceKeyToPath(key: string, home: string): string {
  if (key.startsWith('~') || key.startsWith('/')) {
    return expandPath(key, home);
  }
  return expandPath(`~/${key}`, home);
}

/**
 * Configuration key for a workspace path.
 *
 * Directly under home: the bare name. Elsewhere: "~/..." or the absolute path.
 */
export function workspaceKey(workspacePath: string, home: string = homedir()): string {
  const abbreviated = abbreviatePath(workspacePath, home);
  const name = abbreviated.slice(2);
  if (
    abbreviated.startsWith('~/') &&
    !name.includes('/') &&
    !RESERVED_KEYS.has(name) &&
    name !== LEGACY_WORKSPACES_KEY
  ) {
    return name;
  }
  return abbreviated;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and parse a configuration file
 *
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export function loadConfig(configPath: string, options: ConfigPathOptions = {}): LinkspaceConfig {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(
      `Config file not found: ${absolutePath}`,
      'CONFIG_NOT_FOUND',
      { path: absolutePath }
    );
  }

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_NOT_FOUND',
      { path: absolutePath, originalError: err }
    );
  }

  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Invalid YAML in config file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      { path: absolutePath, originalError: err }
    );
  }

  if (data === null || data === undefined) {
    throw new ConfigError('Config file is empty', 'CONFIG_INVALID', { path: absolutePath });
  }

  return parseConfig(data, options);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalPathField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`"${key}" must be a non-empty path string`, 'CONFIG_INVALID', { key });
  }
  return value;
}

/**
 * Build the in-memory configuration from parsed YAML data
 *
 * @throws ConfigError if the structure is invalid
 */
export function parseConfig(data: unknown, options: ConfigPathOptions = {}): LinkspaceConfig {
  const home = options.home ?? homedir();

  if (!isRecord(data)) {
    throw new ConfigError('Config file must contain a mapping', 'CONFIG_INVALID');
  }

  if (LEGACY_WORKSPACES_KEY in data) {
    throw new ConfigError(
      `The "workspaces" list is not supported. Use top-level keys for workspaces instead. Example:\n` +
        `  store: ~/code\n` +
        `  Projects:\n` +
        `    .: [repo1, repo2]`,
      'CONFIG_INVALID',
      { key: LEGACY_WORKSPACES_KEY }
    );
  }

  const storePath = expandPath(optionalPathField(data, STORE_KEY) ?? DEFAULT_STORE, home);
  const editorWorkspaces = optionalPathField(data, EDITOR_WORKSPACES_KEY);

  const workspaces: Record<string, Workspace> = {};
  const keysByName = new Map<string, string>();

  for (const [key, value] of Object.entries(data)) {
    if (RESERVED_KEYS.has(key)) continue;

    const path = workspaceKeyToPath(key, home);
    const name = basename(path);
    if (name === '') {
      throw new ConfigError(`Workspace "${key}" does not name a directory`, 'CONFIG_INVALID', { key });
    }

    const existingKey = keysByName.get(name);
    if (existingKey !== undefined) {
      const existingPath = workspaces[name]?.path ?? '';
      throw new ConfigError(
        `Workspace basename collision: "${name}" used by both "${existingKey}" (${existingPath}) and "${key}" (${path})`,
        'WORKSPACE_NAME_COLLISION',
        { name, keys: [existingKey, key] }
      );
    }
    keysByName.set(name, key);

    workspaces[name] = { name, path, categories: parseCategories(key, value) };
  }

  const config: LinkspaceConfig = { storePath, workspaces };
  if (editorWorkspaces !== undefined) {
    config.editorWorkspacesPath = expandPath(editorWorkspaces, home);
  }
  return config;
}

function parseCategories(workspaceKeyName: string, value: unknown): Record<string, Category> {
  const categories: Record<string, Category> = {};
  if (value === null || value === undefined) {
    return categories;
  }
  if (!isRecord(value)) {
    throw new ConfigError(
      `Workspace "${workspaceKeyName}" config must be a mapping`,
      'CONFIG_INVALID',
      { workspace: workspaceKeyName }
    );
  }

  for (const [rawPath, rawEntries] of Object.entries(value)) {
    const path = normalizeCategoryPath(rawPath);
    const list = rawEntries ?? [];
    if (!Array.isArray(list)) {
      throw new ConfigError(
        `Category "${rawPath}" in workspace "${workspaceKeyName}" must be a list`,
        'CONFIG_INVALID',
        { workspace: workspaceKeyName, category: rawPath }
      );
    }

    const entries: RepoEntry[] = list.map((item: unknown) => {
      if (typeof item !== 'string') {
        throw new ConfigError(
          `Repo names must be strings, got ${item === null ? 'null' : typeof item} in "${workspaceKeyName}/${rawPath}"`,
          'CONFIG_INVALID',
          { workspace: workspaceKeyName, category: rawPath }
        );
      }
      return parseRepoEntry(item);
    });

    // "./" and "." name the same category; keep both lists
    const existing = categories[path];
    if (existing) {
      existing.entries.push(...entries);
    } else {
      categories[path] = { path, entries };
    }
  }

  return categories;
}

// =============================================================================
// Saving
// =============================================================================

/**
 * Canonical plain-object form of a configuration.
 *
 * Categories are sorted by path and entries by their declaration string.
 */
export function serializeConfig(
  config: LinkspaceConfig,
  options: ConfigPathOptions = {}
): Record<string, unknown> {
  const home = options.home ?? homedir();
  const data: Record<string, unknown> = {
    [STORE_KEY]: abbreviatePath(config.storePath, home),
  };

  if (config.editorWorkspacesPath !== undefined) {
    data[EDITOR_WORKSPACES_KEY] = abbreviatePath(config.editorWorkspacesPath, home);
  }

  for (const workspace of Object.values(config.workspaces)) {
    const categories: Record<string, string[]> = {};
    for (const path of Object.keys(workspace.categories).sort(compareCodeUnits)) {
      const category = workspace.categories[path];
      if (!category) continue;
      categories[path] = category.entries.map(formatRepoEntry).sort(compareCodeUnits);
    }
    data[workspaceKey(workspace.path, home)] = categories;
  }

  return data;
}

/**
 * Render a configuration as YAML text
 */
export function stringifyConfig(config: LinkspaceConfig, options: ConfigPathOptions = {}): string {
  return stringifyYaml(serializeConfig(config, options));
}

/**
 * Write a configuration atomically (temp file, then rename)
 */
export function saveConfig(
  config: LinkspaceConfig,
  configPath: string,
  options: ConfigPathOptions = {}
): void {
  const absolutePath = resolve(configPath);
  mkdirSync(dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.${process.pid}.tmp`;
  writeFileSync(tempPath, stringifyConfig(config, options), 'utf-8');
  renameSync(tempPath, absolutePath);
}

/**
 * Create a fresh configuration with empty workspaces
 *
 * @throws ConfigError (WORKSPACE_NAME_COLLISION) for two paths with the same basename
 */
export function createDefaultConfig(options: DefaultConfigOptions = {}): LinkspaceConfig {
  const home = options.home ?? homedir();
  const storePath = expandPath(options.storePath ?? DEFAULT_STORE, home);
  const workspacePaths = (options.workspacePaths ?? ['~/workspace']).map((path) =>
    expandPath(path, home)
  );

  const workspaces: Record<string, Workspace> = {};
  for (const path of workspacePaths) {
    const name = basename(path);
    const existing = workspaces[name];
    if (existing && existing.path !== path) {
      throw new ConfigError(
        `Workspace basename collision: "${name}" used by both ${existing.path} and ${path}`,
        'WORKSPACE_NAME_COLLISION',
        { name, paths: [existing.path, path] }
      );
    }
    workspaces[name] = { name, path, categories: {} };
  }

  return { storePath, workspaces };
}
