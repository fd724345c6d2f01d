/**
 * Table Directory - process-wide lookup of globally named tables
 *
 * Only the table owner registers here, and only the default-handle storage
 * resolves from here; registry operations always take an explicit table.
 */

import type { CommandTable } from './command-table.js';
import { RegistryError } from '../registry/errors.js';

const tables = new Map<string, CommandTable<unknown>>();

export function registerTable<TRef>(table: CommandTable<TRef>): void {
  if (tables.has(table.name)) {
    throw RegistryError.tableExists(table.name);
  }
  tables.set(table.name, table);
}

export function unregisterTable<TRef>(table: CommandTable<TRef>): boolean {
  if (tables.get(table.name) !== table) {
    return false;
  }
  return tables.delete(table.name);
}

export function hasTable(name: string): boolean {
  return tables.has(name);
}

/**
 * Resolve a globally named table.
 * Throws RegistryError(TABLE_NOT_FOUND) when no running owner published it.
 */
export function resolveTable<TRef = unknown>(name: string): CommandTable<TRef> {
  const table = tables.get(name);
  if (!table) {
    throw RegistryError.tableNotFound(name);
  }
  // The directory is keyed by name only; the caller vouches for the ref type
  return table as CommandTable<TRef>;
}

export function listTableNames(): string[] {
  return Array.from(tables.keys()).sort();
}
