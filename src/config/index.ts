/**
 * Configuration module exports
 */

export {
  resolveConfigPath,
  ENV_LINKSPACE_CONFIG,
  type ConfigPathResolution,
  type ConfigPathResolveOptions,
  type ConfigPathSource,
} from './resolve.js';
