import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

function resolveHomeDir(): string {
  const homeFromEnv = process.env.HOME;
  if (typeof homeFromEnv === 'string' && homeFromEnv.trim()) {
    return homeFromEnv;
  }
  return os.homedir();
}

/**
 * Resolve the config directory, creating it when missing.
 *
 * Order: COMMAND_TREE_CONFIG_DIR, then $XDG_CONFIG_HOME/command-tree,
 * then ~/.config/command-tree.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.COMMAND_TREE_CONFIG_DIR;
  const configDir =
    typeof override === 'string' && override.trim()
      ? override
      : path.join(
          typeof env.XDG_CONFIG_HOME === 'string' && env.XDG_CONFIG_HOME.trim()
            ? env.XDG_CONFIG_HOME
            : path.join(resolveHomeDir(), '.config'),
          'command-tree'
        );

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
  return configDir;
}
