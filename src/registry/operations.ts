/**
 * Registry Operations - add/remove/lookup/list against an explicit table
 *
 * Multi-segment add and remove read the top-level entry, compute the new
 * entry, then write it back with a single put. There is no lock or
 * compare-and-swap between the read and the write: a writer that runs in
 * between (re-entrantly, from a table hook or a handler) has its update
 * overwritten by the outer write.
 */

import type { CommandTable } from '../table/command-table.js';
import type { CommandEntry, CommandPath } from './types.js';
import { leaf } from './types.js';
import { insertEntry, removeEntry } from './path-resolver.js';
import { RegistryError } from './errors.js';
import { debug } from '../debug/index.js';

export type StorageResult =
  | { success: true }
  | { success: false; error: RegistryError };

const OK: StorageResult = { success: true };

function fail<TRef>(table: CommandTable<TRef>, path: CommandPath, error: RegistryError): StorageResult {
  debug.commandRejected(table.name, path, error);
  return { success: false, error };
}

function checkWritable<TRef>(table: CommandTable<TRef>, path: CommandPath): StorageResult | null {
  if (path.length === 0) {
    return fail(table, path, RegistryError.invalidPath('path must contain at least one name'));
  }
  if (!table.writable) {
    return fail(table, path, RegistryError.tableProtected(table.name));
  }
  return null;
}

/**
 * Register `ref` at `path`.
 *
 * A single-segment path always overwrites the top-level entry, even a whole
 * group. Deeper paths create missing groups and fail with LEAF_COLLISION
 * when they would descend through an existing leaf.
 */
export function addCommand<TRef>(table: CommandTable<TRef>, path: CommandPath, ref: TRef): StorageResult {
  const rejected = checkWritable(table, path);
  if (rejected) {
    return rejected;
  }

  const [name, ...subpath] = path;

  if (subpath.length === 0) {
    table.put(name, leaf(ref));
    debug.commandAdded(table.name, path);
    return OK;
  }

  const current = table.get(name);
  if (current?.kind === 'leaf') {
    return fail(table, path, RegistryError.leafCollision(name, subpath, [name], 'add'));
  }

  const outcome = insertEntry(current, subpath, ref);
  if (outcome.status === 'collision') {
    return fail(table, path, RegistryError.leafCollision(name, subpath, [name, ...outcome.at], 'add'));
  }

  table.put(name, outcome.entry);
  debug.commandAdded(table.name, path);
  return OK;
}

/**
 * Remove the entry at `path`, pruning groups left empty.
 *
 * Removing a path that does not exist succeeds without touching the table.
 */
export function removeCommand<TRef>(table: CommandTable<TRef>, path: CommandPath): StorageResult {
  const rejected = checkWritable(table, path);
  if (rejected) {
    return rejected;
  }

  const [name, ...subpath] = path;

  if (subpath.length === 0) {
    table.delete(name);
    debug.commandRemoved(table.name, path, true);
    return OK;
  }

  const current = table.get(name);
  if (current === undefined) {
    return OK;
  }
  if (current.kind === 'leaf') {
    return fail(table, path, RegistryError.leafCollision(name, subpath, [name], 'remove'));
  }

  const outcome = removeEntry(current, subpath);
  switch (outcome.status) {
    case 'unchanged':
      return OK;
    case 'collision':
      return fail(table, path, RegistryError.leafCollision(name, subpath, [name, ...outcome.at], 'remove'));
    case 'emptied':
      table.delete(name);
      debug.commandRemoved(table.name, path, true);
      return OK;
    case 'updated':
      table.put(name, outcome.entry);
      debug.commandRemoved(table.name, path, false);
      return OK;
  }
}

/**
 * Read a top-level name: a leaf, a whole group, or undefined.
 */
export function lookupCommand<TRef>(table: CommandTable<TRef>, name: string): CommandEntry<TRef> | undefined {
  return table.get(name);
}

/**
 * Copy every top-level entry into a new map.
 *
 * Keys are copied one at a time while iterating, so writes racing the copy
 * may show up for some keys and not others.
 */
export function allCommands<TRef>(table: CommandTable<TRef>): Map<string, CommandEntry<TRef>> {
  const snapshot = new Map<string, CommandEntry<TRef>>();
  for (const [name, entry] of table.entries()) {
    snapshot.set(name, entry);
  }
  return snapshot;
}
