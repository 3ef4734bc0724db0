/**
 * Configuration file location
 *
 * Resolved from, in priority order:
 * 1. CLI flag (--config)
 * 2. Environment variable (LINKSPACE_CONFIG)
 * 3. Default location (~/.config/linkspace/config.yaml)
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { defaultConfigPath, expandPath } from '../registry/loader.js';

/** Environment variable naming the configuration file */
export const ENV_LINKSPACE_CONFIG = 'LINKSPACE_CONFIG';

export type ConfigPathSource = 'cli' | 'env' | 'default';

/**
 * Result of configuration path resolution
 */
export interface ConfigPathResolution {
  /** Absolute path of the configuration file */
  path: string;
  /** How the path was resolved */
  source: ConfigPathSource;
  /** Resolution chain attempted (for debugging) */
  attempted: ConfigPathSource[];
}

export interface ConfigPathResolveOptions {
  /** CLI-provided path */
  cliPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Home directory for "~" expansion and the default location */
  home?: string;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
}

/**
 * Resolve which configuration file to use
 */
export function resolveConfigPath(options: ConfigPathResolveOptions = {}): ConfigPathResolution {
  const attempted: ConfigPathSource[] = [];
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const cwd = options.cwd ?? process.cwd();

  const toAbsolute = (path: string): string =>
    path.startsWith('~') ? expandPath(path, home) : resolve(cwd, path);

  attempted.push('cli');
  if (options.cliPath) {
    return { path: toAbsolute(options.cliPath), source: 'cli', attempted };
  }

  attempted.push('env');
  const envPath = env[ENV_LINKSPACE_CONFIG];
  if (envPath) {
    return { path: toAbsolute(envPath), source: 'env', attempted };
  }

  attempted.push('default');
  return { path: defaultConfigPath(home), source: 'default', attempted };
}
