/**
 * Command Storage Types
 */

import type { CommandEntry, CommandPath } from '../registry/types.js';
import type { StorageResult } from '../registry/operations.js';

export type { StorageResult } from '../registry/operations.js';

/**
 * The storage behaviour a command framework registers its handlers through.
 */
export interface CommandStorage<TRef> {
  /** Register a handler; LEAF_COLLISION / INVALID_PATH come back as results */
  addCommand(path: CommandPath, ref: TRef): StorageResult;

  /** Remove a path; missing paths succeed as a no-op */
  removeCommand(path: CommandPath): StorageResult;

  /** Top-level lookup only, not by nested path */
  lookupCommand(name: string): CommandEntry<TRef> | undefined;

  /** Snapshot of every top-level entry */
  allCommands(): Map<string, CommandEntry<TRef>>;
}
