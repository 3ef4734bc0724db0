/**
 * E2E Test Harness for linkspace
 *
 * Provides isolated filesystem sandboxes:
 * - A fake home directory with a store and a config path
 * - Repository and workspace fixtures
 * - Command contexts pointing at the sandbox
 * - Cleanup after tests
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { mkdirSync, readlinkSync, realpathSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CommandContext, GlobalOptions } from '../../src/types.js';

/**
 * Represents an isolated test environment
 */
export interface TestEnvironment {
  /** Root directory of the sandbox (canonical path) */
  root: string;
  /** Fake home directory */
  home: string;
  /** Store directory (~/code) */
  store: string;
  /** Config file path (~/.config/linkspace/config.yaml) */
  configPath: string;
  /** Cleanup function */
  cleanup: () => Promise<void>;
}

/**
 * Create an isolated test environment
 *
 * The store directory is created; workspaces and the config file are not.
 */
export async function createTestEnvironment(name: string): Promise<TestEnvironment> {
  // tmpdir() may itself be a symlink; everything below works on the real path
  const root = realpathSync(await mkdtemp(join(tmpdir(), `linkspace-${name}-`)));
  const home = join(root, 'home');
  const store = join(home, 'code');
  mkdirSync(store, { recursive: true });

  return {
    root,
    home,
    store,
    configPath: join(home, '.config', 'linkspace', 'config.yaml'),
    cleanup: async () => {
      await rm(root, { recursive: true, force: true });
    },
  };
}

/**
 * Create a repository (a directory with a .git marker) in the store
 */
export function makeRepo(env: TestEnvironment, name: string): string {
  const path = join(env.store, name);
  mkdirSync(join(path, '.git'), { recursive: true });
  return path;
}

/**
 * Create a plain directory under the store
 */
export function makeStoreDir(env: TestEnvironment, name: string): string {
  const path = join(env.store, name);
  mkdirSync(path, { recursive: true });
  return path;
}

/**
 * Write the config file
 */
export function writeConfig(env: TestEnvironment, content: string): void {
  mkdirSync(dirname(env.configPath), { recursive: true });
  writeFileSync(env.configPath, content, 'utf-8');
}

/**
 * Create a symlink, making parents as needed
 */
export function makeLink(linkPath: string, target: string): void {
  mkdirSync(dirname(linkPath), { recursive: true });
  symlinkSync(target, linkPath);
}

/**
 * Write a file, making parents as needed
 */
export function makeFile(path: string, content = ''): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}

export function linkTarget(path: string): string {
  return readlinkSync(path);
}

/**
 * Command context pointing at the sandbox config
 */
export function createTestContext(
  env: TestEnvironment,
  overrides: Partial<GlobalOptions> = {}
): CommandContext {
  const options: GlobalOptions = { dryRun: false, json: true, verbose: false, ...overrides };
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    configPath: env.configPath,
    configSource: 'cli',
    home: env.home,
  };
}
