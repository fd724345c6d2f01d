export * from './registry/index.js';
export * from './table/index.js';
export * from './storage/index.js';
export { debug, debugEmitter, DebugEmitter, matchesFilter } from './debug/index.js';
export type { DebugEvent, DebugContext, EventFilter } from './debug/index.js';
export {
  type CommandTreeRuntimeConfig,
  DEFAULT_RUNTIME_CONFIG,
  RuntimeConfigValidationError,
  getConfigDir,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  resolveRuntimeConfigFromEnvironment,
  saveRuntimeConfig,
  isDebugLoggingEnabled,
} from './infra/config/index.js';
