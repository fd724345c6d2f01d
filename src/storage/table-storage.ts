/**
 * Table-backed command storage
 */

import type { CommandTable } from '../table/command-table.js';
import { resolveTable } from '../table/table-directory.js';
import { DEFAULT_TABLE_NAME } from '../table/table-options.js';
import type { CommandEntry, CommandPath } from '../registry/types.js';
import type { StorageResult } from '../registry/operations.js';
import { addCommand, allCommands, lookupCommand, removeCommand } from '../registry/operations.js';
import type { CommandStorage } from './types.js';

/**
 * CommandStorage over a command table.
 *
 * Given a handle it uses that table. Given a name (or nothing, meaning
 * DEFAULT_TABLE_NAME) it resolves the globally named table on every call, so
 * it may be constructed before the owner starts. Resolving a table nobody has
 * published throws RegistryError(TABLE_NOT_FOUND).
 */
export class TableCommandStorage<TRef = unknown> implements CommandStorage<TRef> {
  constructor(private readonly target: CommandTable<TRef> | string = DEFAULT_TABLE_NAME) {}

  get table(): CommandTable<TRef> {
    return typeof this.target === 'string' ? resolveTable<TRef>(this.target) : this.target;
  }

  addCommand(path: CommandPath, ref: TRef): StorageResult {
    return addCommand(this.table, path, ref);
  }

  removeCommand(path: CommandPath): StorageResult {
    return removeCommand(this.table, path);
  }

  lookupCommand(name: string): CommandEntry<TRef> | undefined {
    return lookupCommand(this.table, name);
  }

  allCommands(): Map<string, CommandEntry<TRef>> {
    return allCommands(this.table);
  }
}
