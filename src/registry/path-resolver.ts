/**
 * Path Resolver - pure insert/prune/remove over a single entry value
 *
 * Nothing here touches a table. Every function returns a new entry and
 * leaves its input untouched, so a failed operation has nothing to undo.
 */

import type { CommandEntry, CommandGroup, CommandPath } from './types.js';
import { groupFromMap, leaf } from './types.js';

export type InsertOutcome<TRef> =
  | { status: 'inserted'; entry: CommandGroup<TRef> }
  | { status: 'collision'; at: string[] };

export type RemoveOutcome<TRef> =
  | { status: 'updated'; entry: CommandGroup<TRef> }
  | { status: 'emptied' }
  | { status: 'unchanged' }
  | { status: 'collision'; at: string[] };

/**
 * Insert `ref` at `path` below `existing`, creating missing groups.
 *
 * `existing` must be a group or absent; callers check the top level for a leaf.
 * The final segment replaces whatever it held. A leaf met while segments
 * remain yields a collision whose `at` is relative to `existing`.
 */
export function insertEntry<TRef>(
  existing: CommandGroup<TRef> | undefined,
  path: CommandPath,
  ref: TRef
): InsertOutcome<TRef> {
  const [name, ...rest] = path;
  if (name === undefined) {
    throw new RangeError('insertEntry requires a non-empty path');
  }

  const children = new Map(existing?.children);

  if (rest.length === 0) {
    children.set(name, leaf(ref));
    return { status: 'inserted', entry: groupFromMap(children) };
  }

  const child = children.get(name);
  if (child?.kind === 'leaf') {
    return { status: 'collision', at: [name] };
  }

  const outcome = insertEntry(child, rest, ref);
  if (outcome.status === 'collision') {
    return { status: 'collision', at: [name, ...outcome.at] };
  }

  children.set(name, outcome.entry);
  return { status: 'inserted', entry: groupFromMap(children) };
}

/**
 * A leaf is never empty. A group is empty when all of its children are.
 */
export function isEmptyEntry<TRef>(entry: CommandEntry<TRef>): boolean {
  if (entry.kind === 'leaf') {
    return false;
  }

  for (const child of entry.children.values()) {
    if (!isEmptyEntry(child)) {
      return false;
    }
  }
  return true;
}

/**
 * Remove `path` below `existing` and prune groups left empty.
 *
 * A name missing at any level is a no-op. `emptied` tells the caller to drop
 * the level it holds `existing` under.
 */
export function removeEntry<TRef>(
  existing: CommandGroup<TRef>,
  path: CommandPath
): RemoveOutcome<TRef> {
  const [name, ...rest] = path;
  if (name === undefined) {
    throw new RangeError('removeEntry requires a non-empty path');
  }

  const child = existing.children.get(name);
  if (child === undefined) {
    return { status: 'unchanged' };
  }

  const children = new Map(existing.children);

  if (rest.length === 0) {
    children.delete(name);
  } else {
    if (child.kind === 'leaf') {
      return { status: 'collision', at: [name] };
    }

    const outcome = removeEntry(child, rest);
    switch (outcome.status) {
      case 'unchanged':
        return outcome;
      case 'collision':
        return { status: 'collision', at: [name, ...outcome.at] };
      case 'emptied':
        children.delete(name);
        break;
      case 'updated':
        children.set(name, outcome.entry);
        break;
    }
  }

  for (const [childName, entry] of children) {
    if (isEmptyEntry(entry)) {
      children.delete(childName);
    }
  }

  if (children.size === 0) {
    return { status: 'emptied' };
  }
  return { status: 'updated', entry: groupFromMap(children) };
}
