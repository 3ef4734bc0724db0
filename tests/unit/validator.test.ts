/**
 * Unit Tests: Configuration Validation Rules
 */

import { describe, it, expect } from 'vitest';
import { validateConfigRules } from '../../src/registry/validator.js';
import {
  ConfigValidationError,
  formatIssues,
  pathObstruction,
} from '../../src/registry/errors.js';
import { parseConfig } from '../../src/registry/loader.js';

const HOME = '/nonexistent-home';

function config(data: Record<string, unknown>) {
  return parseConfig(data, { home: HOME });
}

describe('validateConfigRules', () => {
  it('passes a well-formed configuration', () => {
    const result = validateConfigRules(
      config({ Projects: { '.': ['tool'], vendor: ['sdk'] } }),
      { checkPathsExist: false }
    );
    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
  });

  it('warns about missing store and workspace directories', () => {
    const result = validateConfigRules(config({ Projects: {} }));
    expect(result.valid).toBe(true);
    expect(result.warnings.map((issue) => issue.code)).toEqual([
      'STORE_NOT_FOUND',
      'WORKSPACE_PATH_NOT_FOUND',
    ]);
    expect(result.warnings[1]?.message).toBe(
      'Workspace directory does not exist: /nonexistent-home/Projects'
    );
  });

  it('rejects duplicate link names', () => {
    const result = validateConfigRules(
      config({ Projects: { '.': ['alpha:x', 'beta:x'] } }),
      { checkPathsExist: false }
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.code).toBe('DUPLICATE_SYMLINK_NAME');
    expect(result.errors[0]?.message).toBe(
      'Duplicate symlink name "x" in "Projects/.": repos alpha, beta'
    );
  });

  it('rejects a category running through a link', () => {
    const result = validateConfigRules(
      config({ Projects: { '.': ['foo'], 'foo/bar': ['baz'] } }),
      { checkPathsExist: false }
    );
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatchObject({
      code: 'CATEGORY_REPO_COLLISION',
      path: 'Projects/foo/bar',
      message: 'Category path "foo/bar" in workspace "Projects" conflicts with repo "foo" in category "."',
    });
  });

  it('warns about a repository in several categories', () => {
    const result = validateConfigRules(
      config({ Projects: { '.': ['tool'], tools: ['tool:tool-2'] } }),
      { checkPathsExist: false }
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.message).toBe(
      'Repo "tool" appears in multiple categories in "Projects": ., tools'
    );
  });

  it('checks declared repositories against the store when given', () => {
    const result = validateConfigRules(
      config({ Projects: { '.': ['tool', 'missing'] } }),
      { checkPathsExist: false, storeRepos: ['tool'] }
    );
    expect(result.warnings.map((issue) => issue.message)).toEqual([
      'Repository "missing" not found in store /nonexistent-home/code',
    ]);
  });

  it('reports workspaces in name order', () => {
    const result = validateConfigRules(
      config({
        Zeta: { '.': ['a:x', 'b:x'] },
        Alpha: { '.': ['c:y', 'd:y'] },
      }),
      { checkPathsExist: false }
    );
    expect(result.errors.map((issue) => issue.path)).toEqual(['Alpha/.', 'Zeta/.']);
  });

  it('throws when asked to', () => {
    expect(() =>
      validateConfigRules(config({ Projects: { '.': ['a:x', 'b:x'] } }), {
        checkPathsExist: false,
        throwOnError: true,
      })
    ).toThrow(ConfigValidationError);
  });
});

describe('formatIssues', () => {
  it('renders code, path, message and suggestions', () => {
    const issue = pathObstruction('Projects', 'tool', 'file', 'tool');
    expect(formatIssues([issue]).split('\n')).toEqual([
      '❌ [PATH_OBSTRUCTION] Projects/tool',
      '   A file at "Projects/tool" blocks the link "Projects/tool"',
      '   Suggestions:',
      '     • Move the file out of the workspace',
      '     • If it is a clone, move it into the store and run "linkspace adopt"',
    ]);
  });
});
