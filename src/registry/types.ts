/**
 * Command Registry Types
 */

/**
 * A registered handler. The registry stores it verbatim and never looks inside.
 */
export interface CommandLeaf<TRef> {
  readonly kind: 'leaf';
  readonly ref: TRef;
}

/**
 * A named collection of entries, nestable to any depth.
 */
export interface CommandGroup<TRef> {
  readonly kind: 'group';
  readonly children: ReadonlyMap<string, CommandEntry<TRef>>;
}

export type CommandEntry<TRef> = CommandLeaf<TRef> | CommandGroup<TRef>;

/**
 * Ordered list of names from a top-level key down to the target entry.
 */
export type CommandPath = readonly string[];

/**
 * Nested plain-object rendering of an entry (see entryToObject)
 */
export type CommandTreeObject<TRef> = TRef | { [name: string]: CommandTreeObject<TRef> };

export function leaf<TRef>(ref: TRef): CommandLeaf<TRef> {
  return { kind: 'leaf', ref };
}

export function group<TRef>(children: Record<string, CommandEntry<TRef>> = {}): CommandGroup<TRef> {
  return { kind: 'group', children: new Map(Object.entries(children)) };
}

export function groupFromMap<TRef>(children: ReadonlyMap<string, CommandEntry<TRef>>): CommandGroup<TRef> {
  return { kind: 'group', children };
}

export function isLeaf<TRef>(entry: CommandEntry<TRef> | undefined): entry is CommandLeaf<TRef> {
  return entry?.kind === 'leaf';
}

export function isGroup<TRef>(entry: CommandEntry<TRef> | undefined): entry is CommandGroup<TRef> {
  return entry?.kind === 'group';
}

/**
 * Render an entry as nested plain objects, e.g. `{ b: { c: ref } }`.
 * Leaves render as their ref.
 */
export function entryToObject<TRef>(entry: CommandEntry<TRef>): CommandTreeObject<TRef> {
  if (entry.kind === 'leaf') {
    return entry.ref;
  }

  const result: { [name: string]: CommandTreeObject<TRef> } = {};
  for (const [name, child] of entry.children) {
    // defineProperty keeps a child named "__proto__" as an own key
    Object.defineProperty(result, name, {
      value: entryToObject(child),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

export function formatPath(path: CommandPath): string {
  return path.join(' ');
}
