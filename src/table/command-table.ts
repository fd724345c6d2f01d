/**
 * Command Table - the store behind a registry
 *
 * One entry per top-level name. Each get/put/delete is indivisible on its
 * own; nothing here combines a read with a write.
 */

import type { CommandEntry } from '../registry/types.js';
import { RegistryError } from '../registry/errors.js';
import type { TableOptions } from './table-options.js';

export interface CommandTable<TRef> {
  readonly name: string;
  readonly options: Readonly<TableOptions>;
  /** False for read-only handles; put/delete then throw TABLE_PROTECTED */
  readonly writable: boolean;
  readonly size: number;

  get(name: string): CommandEntry<TRef> | undefined;
  put(name: string, entry: CommandEntry<TRef>): void;
  delete(name: string): void;
  /**
   * Iterate entries lazily. Values are read as the iterator reaches each
   * key, so writes made during iteration may or may not be observed.
   */
  entries(): IterableIterator<[string, CommandEntry<TRef>]>;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class MemoryCommandTable<TRef> implements CommandTable<TRef> {
  readonly writable = true;
  private store = new Map<string, CommandEntry<TRef>>();
  private destroyed = false;

  constructor(
    readonly name: string,
    readonly options: Readonly<TableOptions>
  ) {}

  get size(): number {
    this.assertAlive();
    return this.store.size;
  }

  get(name: string): CommandEntry<TRef> | undefined {
    this.assertAlive();
    return this.store.get(name);
  }

  put(name: string, entry: CommandEntry<TRef>): void {
    this.assertAlive();
    this.store.set(name, entry);
  }

  delete(name: string): void {
    this.assertAlive();
    this.store.delete(name);
  }

  *entries(): IterableIterator<[string, CommandEntry<TRef>]> {
    this.assertAlive();

    if (!this.options.orderedKeys) {
      yield* this.store.entries();
      return;
    }

    const keys = Array.from(this.store.keys()).sort(compareKeys);
    for (const key of keys) {
      const entry = this.store.get(key);
      if (entry !== undefined) {
        yield [key, entry];
      }
    }
  }

  /**
   * A handle that reads this table but refuses writes
   */
  readOnlyView(): CommandTable<TRef> {
    return new ReadOnlyCommandTable(this);
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Drop every entry and refuse any further access
   */
  destroy(): void {
    this.store.clear();
    this.destroyed = true;
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw RegistryError.tableDestroyed(this.name);
    }
  }
}

class ReadOnlyCommandTable<TRef> implements CommandTable<TRef> {
  readonly writable = false;

  constructor(private readonly inner: CommandTable<TRef>) {}

  get name(): string {
    return this.inner.name;
  }

  get options(): Readonly<TableOptions> {
    return this.inner.options;
  }

  get size(): number {
    return this.inner.size;
  }

  get(name: string): CommandEntry<TRef> | undefined {
    return this.inner.get(name);
  }

  put(): void {
    throw RegistryError.tableProtected(this.inner.name);
  }

  delete(): void {
    throw RegistryError.tableProtected(this.inner.name);
  }

  entries(): IterableIterator<[string, CommandEntry<TRef>]> {
    return this.inner.entries();
  }
}
