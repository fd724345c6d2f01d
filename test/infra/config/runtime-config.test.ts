import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_RUNTIME_CONFIG,
  RuntimeConfigValidationError,
  getRuntimeConfigPath,
  loadRuntimeConfig,
  resolveRuntimeConfigFromEnvironment,
  saveRuntimeConfig,
} from '../../../src/infra/config/runtime-config.js';
import { getConfigDir } from '../../../src/infra/config/config-paths.js';

describe('runtime-config', () => {
  const originalConfigDir = process.env.COMMAND_TREE_CONFIG_DIR;

  beforeEach(() => {
    process.env.COMMAND_TREE_CONFIG_DIR = fs.mkdtempSync(path.join(os.tmpdir(), 'ct-runtime-config-'));
  });

  afterEach(() => {
    process.env.COMMAND_TREE_CONFIG_DIR = originalConfigDir;
    jest.restoreAllMocks();
  });

  it('returns defaults when no config file exists', () => {
    expect(loadRuntimeConfig()).toEqual(DEFAULT_RUNTIME_CONFIG);
  });

  it('merges a partial file over the defaults', () => {
    fs.writeFileSync(getRuntimeConfigPath(), JSON.stringify({ table: { name: 'bot_commands', orderedKeys: false } }));

    expect(loadRuntimeConfig()).toEqual({
      ...DEFAULT_RUNTIME_CONFIG,
      table: { name: 'bot_commands', orderedKeys: false, publiclyWritable: true, globallyNamed: true },
    });
  });

  it('throws a validation error for files that do not match the schema', () => {
    fs.writeFileSync(getRuntimeConfigPath(), JSON.stringify({ table: { orderedKeys: 'sometimes' }, extra: 1 }));

    expect(() => loadRuntimeConfig()).toThrow(RuntimeConfigValidationError);
    try {
      loadRuntimeConfig();
    } catch (error) {
      expect(error).toBeInstanceOf(RuntimeConfigValidationError);
      if (error instanceof RuntimeConfigValidationError) {
        expect(error.errors).toEqual(
          expect.arrayContaining([
            { path: '/', message: 'must NOT have additional properties' },
            { path: '/table/orderedKeys', message: 'must be boolean' },
          ])
        );
      }
    }
  });

  it('warns and falls back to defaults for unparsable files', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.writeFileSync(getRuntimeConfigPath(), '{ not json');

    expect(loadRuntimeConfig()).toEqual(DEFAULT_RUNTIME_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('[RuntimeConfig] Failed to load');
  });

  it('round-trips through saveRuntimeConfig', () => {
    const config = {
      ...DEFAULT_RUNTIME_CONFIG,
      table: { ...DEFAULT_RUNTIME_CONFIG.table, name: 'saved', publiclyWritable: false },
      debug: { loggingEnabled: true },
    };

    saveRuntimeConfig(config);

    expect(loadRuntimeConfig()).toEqual(config);
  });

  it('resolves settings from environment variables', () => {
    const config = resolveRuntimeConfigFromEnvironment({
      COMMAND_TREE_TABLE: 'env_commands',
      COMMAND_TREE_ORDERED_KEYS: 'off',
      COMMAND_TREE_PUBLIC: 'no',
      COMMAND_TREE_DEBUG: '1',
    });

    expect(config.table).toEqual({
      name: 'env_commands',
      orderedKeys: false,
      publiclyWritable: false,
      globallyNamed: true,
    });
    expect(config.debug.loggingEnabled).toBe(true);
  });

  it('resolves the config dir from XDG_CONFIG_HOME when not overridden', () => {
    const xdg = fs.mkdtempSync(path.join(os.tmpdir(), 'ct-xdg-'));

    const dir = getConfigDir({ XDG_CONFIG_HOME: xdg });

    expect(dir).toBe(path.join(xdg, 'command-tree'));
    expect(fs.existsSync(dir)).toBe(true);
  });
});
