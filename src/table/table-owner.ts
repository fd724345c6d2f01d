/**
 * Table Owner - creates a command table and publishes its handle
 *
 * The owner is pure lifecycle plumbing: it is not involved in add, remove
 * or lookup. Stopping the owner destroys the table and every entry in it.
 */

import type { CommandTable } from './command-table.js';
import { MemoryCommandTable } from './command-table.js';
import type { TableOptions } from './table-options.js';
import { DEFAULT_TABLE_NAME, DEFAULT_TABLE_OPTIONS, resolveTableOptions } from './table-options.js';
import { registerTable, unregisterTable } from './table-directory.js';
import { RegistryError } from '../registry/errors.js';
import { debug, debugEmitter } from '../debug/index.js';
import { isDebugEnvEnabled } from '../infra/config/debug-flags.js';
import type { CommandTreeRuntimeConfig } from '../infra/config/runtime-config.js';
import { loadRuntimeConfig } from '../infra/config/runtime-config.js';

export interface StartupOptions {
  /** Enable debug events; defaults to the COMMAND_TREE_DEBUG / DEBUG_MODE env switches */
  debug?: boolean;
}

// Running owners that switched debug emission on; the last one to stop switches it off
let debugOwners = 0;

export class TableOwner<TRef = unknown> {
  private table: MemoryCommandTable<TRef> | null;
  private readonly published: CommandTable<TRef>;
  private debugEnabled = false;

  private constructor(table: MemoryCommandTable<TRef>) {
    this.table = table;
    this.published = table.options.publiclyWritable ? table : table.readOnlyView();
  }

  /**
   * Create an empty table and publish it.
   * Throws RegistryError(TABLE_EXISTS) if a globally named table of the same
   * name is already running, RegistryError(INVALID_TABLE_OPTIONS) on bad input.
   */
  static start<TRef = unknown>(
    tableName: string = DEFAULT_TABLE_NAME,
    tableOptions: Partial<TableOptions> = DEFAULT_TABLE_OPTIONS,
    startupOptions: StartupOptions = {}
  ): TableOwner<TRef> {
    const { name, options } = resolveTableOptions(tableName, tableOptions);

    const owner = new TableOwner<TRef>(new MemoryCommandTable<TRef>(name, options));
    if (options.globallyNamed) {
      registerTable(owner.published);
    }

    if (startupOptions.debug ?? isDebugEnvEnabled()) {
      owner.debugEnabled = true;
      debugOwners += 1;
      debugEmitter.enable();
    }

    debug.tableCreated(name, { ...options });
    return owner;
  }

  /**
   * Start an owner from the runtime config (command-tree.json / defaults)
   */
  static fromRuntimeConfig<TRef = unknown>(
    config: CommandTreeRuntimeConfig = loadRuntimeConfig()
  ): TableOwner<TRef> {
    const { name, ...options } = config.table;
    return TableOwner.start<TRef>(name, options, { debug: config.debug.loggingEnabled });
  }

  get name(): string {
    return this.published.name;
  }

  isRunning(): boolean {
    return this.table !== null;
  }

  /**
   * The handle callers use directly. Read-only unless the table is publicly writable.
   * Throws RegistryError(OWNER_STOPPED) once the owner has stopped.
   */
  getTableHandle(): CommandTable<TRef> {
    if (!this.table) {
      throw RegistryError.ownerStopped(this.published.name);
    }
    return this.published;
  }

  /**
   * The owner's own handle, writable regardless of publiclyWritable
   */
  getWritableHandle(): CommandTable<TRef> {
    if (!this.table) {
      throw RegistryError.ownerStopped(this.published.name);
    }
    return this.table;
  }

  /**
   * Unpublish and destroy the table. Safe to call twice.
   */
  stop(): void {
    const table = this.table;
    if (!table) {
      return;
    }

    const entryCount = table.size;
    if (table.options.globallyNamed) {
      unregisterTable(this.published);
    }
    table.destroy();
    this.table = null;

    debug.tableDestroyed(table.name, entryCount);

    if (this.debugEnabled) {
      this.debugEnabled = false;
      debugOwners -= 1;
      if (debugOwners === 0) {
        debugEmitter.disable();
      }
    }
  }
}
