/**
 * Unit Tests: Config Loader
 *
 * YAML parsing into the entity model, "~" handling, canonical serialization
 * and atomic saving.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import {
  abbreviatePath,
  createDefaultConfig,
  defaultConfigPath,
  expandPath,
  loadConfig,
  parseConfig,
  saveConfig,
  serializeConfig,
  stringifyConfig,
  workspaceKey,
} from '../../src/registry/loader.js';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../../src/registry/types.js';
import { createTestEnvironment, writeConfig, type TestEnvironment } from '../e2e/harness.js';

const HOME = '/home/tester';

// =============================================================================
// Paths
// =============================================================================

describe('path helpers', () => {
  it('places the default config under ~/.config', () => {
    expect(defaultConfigPath(HOME)).toBe('/home/tester/.config/linkspace/config.yaml');
  });

  it('expands "~"', () => {
    expect(expandPath('~', HOME)).toBe('/home/tester');
    expect(expandPath('~/code', HOME)).toBe('/home/tester/code');
    expect(expandPath('/srv/code', HOME)).toBe('/srv/code');
  });

  it('abbreviates paths under home', () => {
    expect(abbreviatePath('/home/tester', HOME)).toBe('~');
    expect(abbreviatePath('/home/tester/code', HOME)).toBe('~/code');
    expect(abbreviatePath('/srv/code', HOME)).toBe('/srv/code');
  });

  it('uses bare keys only for direct children of home', () => {
    expect(workspaceKey('/home/tester/Projects', HOME)).toBe('Projects');
    expect(workspaceKey('/home/tester/work/Projects', HOME)).toBe('~/work/Projects');
    expect(workspaceKey('/home/tester/store', HOME)).toBe('~/store');
    expect(workspaceKey('/home/tester/workspaces', HOME)).toBe('~/workspaces');
    expect(workspaceKey('/srv/Projects', HOME)).toBe('/srv/Projects');
  });
});

// =============================================================================
// parseConfig
// =============================================================================

describe('parseConfig', () => {
  it('builds workspaces from top-level keys', () => {
    const config = parseConfig(
      {
        store: '~/code',
        Projects: { '.': ['tool-a', 'acme-code:git'], 'vendor/acme/': ['acme-sdk'] },
      },
      { home: HOME }
    );

    expect(config.storePath).toBe('/home/tester/code');
    expect(config.editorWorkspacesPath).toBeUndefined();
    expect(config.workspaces).toEqual({
      Projects: {
        name: 'Projects',
        path: '/home/tester/Projects',
        categories: {
          '.': { path: '.', entries: [{ repoName: 'tool-a' }, { repoName: 'acme-code', alias: 'git' }] },
          'vendor/acme': { path: 'vendor/acme', entries: [{ repoName: 'acme-sdk' }] },
        },
      },
    });
  });

  it('defaults the store to ~/code', () => {
    expect(parseConfig({}, { home: HOME }).storePath).toBe('/home/tester/code');
  });

  it('reads editor_workspaces', () => {
    const config = parseConfig({ editor_workspaces: '~/ws-files' }, { home: HOME });
    expect(config.editorWorkspacesPath).toBe('/home/tester/ws-files');
  });

  it('accepts path keys', () => {
    const config = parseConfig({ '~/work/Projects': null, '/srv/Shared': {} }, { home: HOME });
    expect(config.workspaces['Projects']?.path).toBe('/home/tester/work/Projects');
    expect(config.workspaces['Shared']?.path).toBe('/srv/Shared');
  });

  it('treats a null category as empty', () => {
    const config = parseConfig({ Projects: { tools: null } }, { home: HOME });
    expect(config.workspaces['Projects']?.categories['tools']).toEqual({ path: 'tools', entries: [] });
  });

  it('merges categories that normalize to the same path', () => {
    const config = parseConfig({ Projects: { '.': ['a'], './': ['b'] } }, { home: HOME });
    expect(config.workspaces['Projects']?.categories['.']?.entries).toEqual([
      { repoName: 'a' },
      { repoName: 'b' },
    ]);
  });

  it('rejects the legacy workspaces list', () => {
    expect(() => parseConfig({ workspaces: [] }, { home: HOME })).toThrow(
      /The "workspaces" list is not supported/
    );
  });

  it('rejects workspace basename collisions', () => {
    expect(() =>
      parseConfig({ Projects: {}, '~/work/Projects': {} }, { home: HOME })
    ).toThrow(
      'Workspace basename collision: "Projects" used by both "Projects" (/home/tester/Projects) and "~/work/Projects" (/home/tester/work/Projects)'
    );
  });

  it('rejects a category that is not a list', () => {
    expect(() => parseConfig({ Projects: { tools: 'a' } }, { home: HOME })).toThrow(
      'Category "tools" in workspace "Projects" must be a list'
    );
  });

  it('rejects non-string entries', () => {
    expect(() => parseConfig({ Projects: { '.': [42] } }, { home: HOME })).toThrow(
      'Repo names must be strings, got number in "Projects/."'
    );
  });

  it('rejects a workspace whose value is not a mapping', () => {
    expect(() => parseConfig({ Projects: ['a'] }, { home: HOME })).toThrow(
      'Workspace "Projects" config must be a mapping'
    );
  });

  it('rejects a non-mapping document', () => {
    expect(() => parseConfig(['a'], { home: HOME })).toThrow('Config file must contain a mapping');
  });
});

// =============================================================================
// Serialization
// =============================================================================

describe('serializeConfig', () => {
  it('sorts categories and entries and abbreviates paths', () => {
    const config = parseConfig(
      {
        store: '/home/tester/code',
        editor_workspaces: '/home/tester/ws-files',
        Projects: { vendor: ['zeta', 'alpha'], '.': ['tool', 'acme-code:git'] },
      },
      { home: HOME }
    );

    expect(serializeConfig(config, { home: HOME })).toEqual({
      store: '~/code',
      editor_workspaces: '~/ws-files',
      Projects: {
        '.': ['acme-code:git', 'tool'],
        vendor: ['alpha', 'zeta'],
      },
    });
  });

  it('renders YAML that parses back to the same configuration', () => {
    const config = parseConfig(
      { Projects: { '.': ['tool', 'acme-code:git'], 'vendor/acme': ['sdk'] } },
      { home: HOME }
    );
    const text = stringifyConfig(config, { home: HOME });

    expect(text.split('\n')[0]).toBe('store: ~/code');
    expect(parseConfig(parseYaml(text), { home: HOME })).toEqual({
      storePath: '/home/tester/code',
      workspaces: {
        Projects: {
          name: 'Projects',
          path: '/home/tester/Projects',
          categories: {
            '.': { path: '.', entries: [{ repoName: 'acme-code', alias: 'git' }, { repoName: 'tool' }] },
            'vendor/acme': { path: 'vendor/acme', entries: [{ repoName: 'sdk' }] },
          },
        },
      },
    });
  });
});

// =============================================================================
// File I/O
// =============================================================================

describe('loadConfig / saveConfig', () => {
  let env: TestEnvironment;

  beforeEach(async () => {
    env = await createTestEnvironment('loader');
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it('reports a missing file', () => {
    expect(() => loadConfig(env.configPath, { home: env.home })).toThrow(ConfigError);
    expect(() => loadConfig(env.configPath, { home: env.home })).toThrow(/^Config file not found: /);
  });

  it('reports invalid YAML', () => {
    writeConfig(env, 'Projects: [unclosed\n');
    expect(() => loadConfig(env.configPath, { home: env.home })).toThrow(/^Invalid YAML in config file: /);
  });

  it('reports an empty file', () => {
    writeConfig(env, '');
    expect(() => loadConfig(env.configPath, { home: env.home })).toThrow('Config file is empty');
  });

  it('saves atomically and loads the result back', () => {
    const config = createDefaultConfig({ home: env.home, workspacePaths: ['~/Projects'] });
    const projects = config.workspaces['Projects'];
    if (!projects) throw new Error('expected the Projects workspace');
    projects.categories['.'] = { path: '.', entries: [{ repoName: 'tool' }] };

    saveConfig(config, env.configPath, { home: env.home });

    expect(readdirSync(join(env.home, '.config', 'linkspace'))).toEqual(['config.yaml']);
    expect(loadConfig(env.configPath, { home: env.home })).toEqual(config);
  });
});

describe('createDefaultConfig', () => {
  it('defaults to ~/code and ~/workspace', () => {
    expect(createDefaultConfig({ home: HOME })).toEqual({
      storePath: '/home/tester/code',
      workspaces: {
        workspace: { name: 'workspace', path: '/home/tester/workspace', categories: {} },
      },
    });
  });

  it('rejects two workspaces with the same basename', () => {
    expect(() =>
      createDefaultConfig({ home: HOME, workspacePaths: ['~/Projects', '/srv/Projects'] })
    ).toThrow(/Workspace basename collision/);
  });
});
