/**
 * Configuration validation issue types
 *
 * Structured issues for configuration rules, each with a code, a dotted
 * location and suggestions for fixing it.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Validation issue codes
 */
export type ValidationErrorCode =
  | 'STORE_NOT_FOUND'
  | 'WORKSPACE_PATH_NOT_FOUND'
  | 'DUPLICATE_SYMLINK_NAME'
  | 'CATEGORY_REPO_COLLISION'
  | 'REPO_IN_MULTIPLE_CATEGORIES'
  | 'REPO_NOT_IN_STORE'
  | 'PATH_OBSTRUCTION';

// =============================================================================
// Validation Issue Types
// =============================================================================

export type ValidationSeverity = 'error' | 'warning';

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ValidationErrorCode;
  severity: ValidationSeverity;
  /** Human-readable message */
  message: string;
  /** Location of the problem (e.g., "Projects/vendor/acme") */
  path: string;
  /** Additional context about the issue */
  context?: Record<string, unknown>;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

/**
 * Result of configuration validation
 */
export interface ValidationResult {
  /** Whether validation passed (no errors) */
  valid: boolean;
  issues: ValidationIssue[];
  /** Error-level issues only */
  errors: ValidationIssue[];
  /** Warning-level issues only */
  warnings: ValidationIssue[];
}

// =============================================================================
// Validation Error Class
// =============================================================================

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly result: ValidationResult
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    return formatIssues(this.result.errors);
  }

  /**
   * Format all issues (including warnings) for display
   */
  formatAll(): string {
    return formatIssues(this.result.issues);
  }
}

/**
 * Render issues as indented text blocks
 */
export function formatIssues(issues: ValidationIssue[]): string {
  const lines: string[] = [];

  for (const issue of issues) {
    const prefix = issue.severity === 'error' ? '❌' : '⚠️';
    lines.push(`${prefix} [${issue.code}] ${issue.path}`);
    lines.push(`   ${issue.message}`);
    if (issue.suggestions?.length) {
      lines.push(`   Suggestions:`);
      for (const suggestion of issue.suggestions) {
        lines.push(`     • ${suggestion}`);
      }
    }
  }

  return lines.join('\n');
}

// =============================================================================
// Issue Builders
// =============================================================================

export function storeNotFound(storePath: string): ValidationIssue {
  return {
    code: 'STORE_NOT_FOUND',
    severity: 'warning',
    message: `Store directory does not exist: ${storePath}`,
    path: 'store',
    context: { storePath },
    suggestions: [
      `Create the directory or point "store" at an existing one`,
    ],
  };
}

export function workspacePathNotFound(workspace: string, workspacePath: string): ValidationIssue {
  return {
    code: 'WORKSPACE_PATH_NOT_FOUND',
    severity: 'warning',
    message: `Workspace directory does not exist: ${workspacePath}`,
    path: workspace,
    context: { workspace, workspacePath },
    suggestions: [
      `Run "linkspace apply -w ${workspace}" to create it`,
    ],
  };
}

/**
 * Create a duplicate link name issue
 */
export function duplicateSymlinkName(
  workspace: string,
  categoryPath: string,
  symlinkName: string,
  repoNames: string[]
): ValidationIssue {
  return {
    code: 'DUPLICATE_SYMLINK_NAME',
    severity: 'error',
    message: `Duplicate symlink name "${symlinkName}" in "${workspace}/${categoryPath}": repos ${repoNames.join(', ')}`,
    path: `${workspace}/${categoryPath}`,
    context: { workspace, categoryPath, symlinkName, repoNames },
    suggestions: [
      `Give one of the entries an alias (e.g., "${repoNames[0] ?? symlinkName}:other-name")`,
      `Move one of the repositories to a different category`,
    ],
  };
}

/**
 * Create a category/link collision issue
 */
export function categoryRepoCollision(
  workspace: string,
  categoryPath: string,
  parentCategory: string,
  symlinkName: string
): ValidationIssue {
  return {
    code: 'CATEGORY_REPO_COLLISION',
    severity: 'error',
    message: `Category path "${categoryPath}" in workspace "${workspace}" conflicts with repo "${symlinkName}" in category "${parentCategory}"`,
    path: `${workspace}/${categoryPath}`,
    context: { workspace, categoryPath, parentCategory, symlinkName },
    suggestions: [
      `Rename the category so "${symlinkName}" is not used as a directory`,
      `Alias the repository in "${parentCategory}" to a different link name`,
    ],
  };
}

export function repoInMultipleCategories(
  workspace: string,
  repoName: string,
  categoryPaths: string[]
): ValidationIssue {
  return {
    code: 'REPO_IN_MULTIPLE_CATEGORIES',
    severity: 'warning',
    message: `Repo "${repoName}" appears in multiple categories in "${workspace}": ${categoryPaths.join(', ')}`,
    path: workspace,
    context: { workspace, repoName, categoryPaths },
  };
}

export function repoNotInStore(
  workspace: string,
  categoryPath: string,
  repoName: string,
  storePath: string
): ValidationIssue {
  return {
    code: 'REPO_NOT_IN_STORE',
    severity: 'warning',
    message: `Repository "${repoName}" not found in store ${storePath}`,
    path: `${workspace}/${categoryPath}`,
    context: { workspace, categoryPath, repoName, storePath },
    suggestions: [
      `Clone the repository into ${storePath}`,
      `Remove the entry from the configuration`,
    ],
  };
}

/**
 * Create an issue for a non-symlink entry standing where a link must go
 */
export function pathObstruction(
  workspace: string,
  path: string,
  obstruction: string,
  blockedLink: string
): ValidationIssue {
  return {
    code: 'PATH_OBSTRUCTION',
    severity: 'error',
    message: `A ${obstruction} at "${workspace}/${path}" blocks the link "${workspace}/${blockedLink}"`,
    path: `${workspace}/${path}`,
    context: { workspace, path, obstruction, blockedLink },
    suggestions: [
      `Move the ${obstruction} out of the workspace`,
      `If it is a clone, move it into the store and run "linkspace adopt"`,
    ],
  };
}

// =============================================================================
// Result Builders
// =============================================================================

/**
 * Create a successful validation result
 */
export function validationSuccess(warnings: ValidationIssue[] = []): ValidationResult {
  return {
    valid: true,
    issues: warnings,
    errors: [],
    warnings,
  };
}

/**
 * Create a validation result from a mixed list of issues
 */
export function validationFailure(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter(i => i.severity === 'error');
  const warnings = issues.filter(i => i.severity === 'warning');
  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}

/**
 * Merge multiple validation results
 */
export function mergeValidationResults(...results: ValidationResult[]): ValidationResult {
  const allIssues: ValidationIssue[] = [];
  for (const result of results) {
    allIssues.push(...result.issues);
  }
  return validationFailure(allIssues);
}
