/**
 * linkspace library entry point
 *
 * Everything the CLI does is available here without going through commander.
 */

export * from './registry/types.js';
export * from './registry/model.js';
export * from './registry/errors.js';
export * from './registry/validator.js';
export * from './registry/loader.js';
export * from './reconcilers/index.js';
export * from './config/index.js';
export * from './commands/index.js';
export { Logger, createLogger, logger, type LogLevel, type LoggerConfig } from './utils/logger.js';
export type { CommandContext, CommandResult, GlobalOptions, OutputFormat } from './types.js';
