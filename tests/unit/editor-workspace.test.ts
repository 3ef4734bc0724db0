/**
 * Unit Tests: Editor Workspace Files
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  buildEditorWorkspace,
  editorWorkspaceFileName,
  writeEditorWorkspace,
} from '../../src/reconcilers/editor/index.js';
import { parseConfig } from '../../src/registry/loader.js';
import { createTestEnvironment, type TestEnvironment } from '../e2e/harness.js';

const HOME = '/home/tester';

const config = parseConfig(
  {
    Projects: {
      '.': ['zeta', 'acme-code:git'],
      'vendor/acme': ['sdk', 'zeta'],
    },
  },
  { home: HOME }
);

describe('editorWorkspaceFileName', () => {
  it('names files after the workspace or category', () => {
    expect(editorWorkspaceFileName('Projects')).toBe('Projects.code-workspace');
    expect(editorWorkspaceFileName('Projects', '.')).toBe('Projects-root.code-workspace');
    expect(editorWorkspaceFileName('Projects', 'vendor/acme/')).toBe('vendor-acme.code-workspace');
  });
});

describe('buildEditorWorkspace', () => {
  it('lists every link once, sorted by name, relative to the output directory', () => {
    const result = buildEditorWorkspace(config, 'Projects', { outputDir: '/home/tester/ws-files' });

    expect(result).toEqual({
      folders: [
        { name: 'git', path: '../Projects/git' },
        { name: 'sdk', path: '../Projects/vendor/acme/sdk' },
        { name: 'zeta', path: '../Projects/zeta' },
      ],
      settings: {},
    });
  });

  it('limits folders to one category', () => {
    const result = buildEditorWorkspace(config, 'Projects', {
      outputDir: '/home/tester/Projects',
      categoryPath: 'vendor/acme',
    });

    expect(result.folders).toEqual([
      { name: 'sdk', path: 'vendor/acme/sdk' },
      { name: 'zeta', path: 'vendor/acme/zeta' },
    ]);
  });

  it('rejects unknown categories', () => {
    expect(() =>
      buildEditorWorkspace(config, 'Projects', { outputDir: HOME, categoryPath: 'nope' })
    ).toThrow('Category "nope" not found in workspace "Projects". Available: ., vendor/acme');
  });
});

describe('writeEditorWorkspace', () => {
  let env: TestEnvironment;

  beforeEach(async () => {
    env = await createTestEnvironment('editor');
  });

  afterEach(async () => {
    await env.cleanup();
  });

  it('writes pretty-printed JSON with a trailing newline', () => {
    const path = join(env.root, 'out', 'Projects.code-workspace');
    writeEditorWorkspace({ folders: [{ name: 'tool', path: '../Projects/tool' }], settings: {} }, path);

    expect(readFileSync(path, 'utf-8')).toBe(
      '{\n  "folders": [\n    {\n      "name": "tool",\n      "path": "../Projects/tool"\n    }\n  ],\n  "settings": {}\n}\n'
    );
  });
});
