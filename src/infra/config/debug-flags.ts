import { loadRuntimeConfig } from './runtime-config.js';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

function isTruthy(value: string | undefined): boolean {
  return typeof value === 'string' && TRUE_VALUES.has(value.trim().toLowerCase());
}

export function isCommandTreeDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.COMMAND_TREE_DEBUG !== undefined) {
    return env.COMMAND_TREE_DEBUG === '1';
  }

  return loadRuntimeConfig().debug.loggingEnabled;
}

/**
 * Environment switches only; never reads the config file
 */
export function isDebugEnvEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.COMMAND_TREE_DEBUG === '1' || isLegacyDebugEnabled(env);
}

export function isLegacyDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthy(env.DEBUG_MODE);
}

export function isDebugLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isCommandTreeDebugEnabled(env) || isLegacyDebugEnabled(env);
}
