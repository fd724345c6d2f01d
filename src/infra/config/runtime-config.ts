import * as fs from 'fs';
import * as path from 'path';
import Ajv2020 from 'ajv/dist/2020.js';
import { getConfigDir } from './config-paths.js';

export interface CommandTreeRuntimeConfig {
  $schema?: string;
  table: {
    name: string;
    orderedKeys: boolean;
    publiclyWritable: boolean;
    globallyNamed: boolean;
  };
  debug: {
    loggingEnabled: boolean;
  };
}

export class RuntimeConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'RuntimeConfigValidationError';
  }
}

export const DEFAULT_RUNTIME_CONFIG: CommandTreeRuntimeConfig = {
  $schema: './command-tree.schema.json',
  table: {
    name: 'command_registry',
    orderedKeys: true,
    publiclyWritable: true,
    globallyNamed: true,
  },
  debug: {
    loggingEnabled: false,
  },
};

const EMBEDDED_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://command-tree.dev/schemas/command-tree.schema.json',
  title: 'Command Tree Runtime Configuration',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    table: {
      type: 'object',
      properties: {
        name: { type: 'string', minLength: 1 },
        orderedKeys: { type: 'boolean' },
        publiclyWritable: { type: 'boolean' },
        globallyNamed: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    debug: {
      type: 'object',
      properties: {
        loggingEnabled: { type: 'boolean' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export function getRuntimeConfigPath(): string {
  return path.join(getConfigDir(), 'command-tree.json');
}

function toBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  }

  return fallback;
}

function toStringValue(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value : fallback;
}

export function resolveRuntimeConfigFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): CommandTreeRuntimeConfig {
  return {
    ...DEFAULT_RUNTIME_CONFIG,
    table: {
      name: toStringValue(env.COMMAND_TREE_TABLE, DEFAULT_RUNTIME_CONFIG.table.name),
      orderedKeys: toBoolean(env.COMMAND_TREE_ORDERED_KEYS, DEFAULT_RUNTIME_CONFIG.table.orderedKeys),
      publiclyWritable: toBoolean(env.COMMAND_TREE_PUBLIC, DEFAULT_RUNTIME_CONFIG.table.publiclyWritable),
      globallyNamed: toBoolean(env.COMMAND_TREE_NAMED, DEFAULT_RUNTIME_CONFIG.table.globallyNamed),
    },
    debug: {
      loggingEnabled: env.COMMAND_TREE_DEBUG === '1',
    },
  };
}

/**
 * Validate a parsed config file against the embedded JSON Schema
 */
export function validateRuntimeConfig(config: unknown): void {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  const validate = ajv.compile(EMBEDDED_SCHEMA);

  if (!validate(config)) {
    const errors = (validate.errors || []).map((err) => ({
      path: err.instancePath || '/',
      message: err.message || 'Unknown validation error',
    }));

    throw new RuntimeConfigValidationError(
      `Invalid runtime config: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      errors
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, value: unknown): Record<string, unknown> {
  if (!isPlainObject(value)) {
    return { ...base };
  }

  const merged: Record<string, unknown> = { ...base };

  for (const key of Object.keys(value)) {
    const baseValue = merged[key];
    const sourceValue = value[key];

    if (isPlainObject(baseValue) && isPlainObject(sourceValue)) {
      merged[key] = deepMerge(baseValue, sourceValue);
    } else {
      merged[key] = sourceValue;
    }
  }

  return merged;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isPlainObject(value) ? value : {};
}

function normalizeConfig(raw: Record<string, unknown>): CommandTreeRuntimeConfig {
  const table = section(raw, 'table');
  const debug = section(raw, 'debug');

  return {
    $schema: './command-tree.schema.json',
    table: {
      name: toStringValue(table.name, DEFAULT_RUNTIME_CONFIG.table.name),
      orderedKeys: toBoolean(table.orderedKeys, DEFAULT_RUNTIME_CONFIG.table.orderedKeys),
      publiclyWritable: toBoolean(table.publiclyWritable, DEFAULT_RUNTIME_CONFIG.table.publiclyWritable),
      globallyNamed: toBoolean(table.globallyNamed, DEFAULT_RUNTIME_CONFIG.table.globallyNamed),
    },
    debug: {
      loggingEnabled: toBoolean(debug.loggingEnabled, DEFAULT_RUNTIME_CONFIG.debug.loggingEnabled),
    },
  };
}

function defaultConfig(): CommandTreeRuntimeConfig {
  return normalizeConfig({ ...DEFAULT_RUNTIME_CONFIG });
}

/**
 * Load command-tree.json from the config directory.
 * Returns defaults when the file is missing or unreadable.
 * Throws RuntimeConfigValidationError if the file does not match the schema.
 */
export function loadRuntimeConfig(): CommandTreeRuntimeConfig {
  const configPath = getRuntimeConfigPath();

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    console.warn(`[RuntimeConfig] Failed to load ${configPath}, using defaults: ${
      error instanceof Error ? error.message : String(error)
    }`);
    return defaultConfig();
  }

  validateRuntimeConfig(parsed);
  return normalizeConfig(deepMerge({ ...DEFAULT_RUNTIME_CONFIG }, parsed));
}

export function saveRuntimeConfig(config: CommandTreeRuntimeConfig): void {
  const configPath = getRuntimeConfigPath();
  fs.writeFileSync(configPath, JSON.stringify(normalizeConfig({ ...config }), null, 2), { mode: 0o600 });
}
