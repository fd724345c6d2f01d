/**
 * Configuration module exports
 */
export { getConfigDir } from './config-paths.js';

export {
  type CommandTreeRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  RuntimeConfigValidationError,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  resolveRuntimeConfigFromEnvironment,
  saveRuntimeConfig,
  validateRuntimeConfig,
} from './runtime-config.js';

export {
  isCommandTreeDebugEnabled,
  isDebugEnvEnabled,
  isDebugLoggingEnabled,
  isLegacyDebugEnabled,
} from './debug-flags.js';
