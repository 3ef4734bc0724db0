/**
 * Shared types and interfaces for the linkspace CLI
 */

import type { ConfigPathSource } from './config/resolve.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Configuration file path */
  config?: string;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  warnings?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Absolute path of the configuration file */
  configPath: string;
  /** How the configuration path was resolved */
  configSource: ConfigPathSource;
  /** Home directory used for "~" expansion */
  home: string;
}
