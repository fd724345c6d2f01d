import { MemoryCommandTable } from '../../src/table/command-table.js';
import { DEFAULT_TABLE_OPTIONS } from '../../src/table/table-options.js';
import { RegistryError } from '../../src/registry/errors.js';
import { leaf } from '../../src/registry/types.js';

function keysOf(table: MemoryCommandTable<string>): string[] {
  return Array.from(table.entries(), ([name]) => name);
}

describe('MemoryCommandTable', () => {
  it('stores, replaces and deletes entries by key', () => {
    const table = new MemoryCommandTable<string>('t', DEFAULT_TABLE_OPTIONS);

    table.put('ping', leaf('H1'));
    table.put('ping', leaf('H2'));
    expect(table.get('ping')).toEqual(leaf('H2'));
    expect(table.size).toBe(1);

    table.delete('ping');
    table.delete('ping');
    expect(table.get('ping')).toBeUndefined();
    expect(table.size).toBe(0);
  });

  it('enumerates keys in ascending order when orderedKeys is set', () => {
    const table = new MemoryCommandTable<string>('t', { ...DEFAULT_TABLE_OPTIONS, orderedKeys: true });
    for (const name of ['mod', 'Admin', 'ban', 'admin']) {
      table.put(name, leaf(name));
    }

    expect(keysOf(table)).toEqual(['Admin', 'admin', 'ban', 'mod']);
  });

  it('enumerates keys in insertion order otherwise', () => {
    const table = new MemoryCommandTable<string>('t', { ...DEFAULT_TABLE_OPTIONS, orderedKeys: false });
    for (const name of ['mod', 'Admin', 'ban']) {
      table.put(name, leaf(name));
    }

    expect(keysOf(table)).toEqual(['mod', 'Admin', 'ban']);
  });

  it('reads each value as iteration reaches it', () => {
    const table = new MemoryCommandTable<string>('t', DEFAULT_TABLE_OPTIONS);
    table.put('a', leaf('A1'));
    table.put('b', leaf('B1'));
    table.put('c', leaf('C1'));

    const seen: Array<[string, unknown]> = [];
    for (const [name, entry] of table.entries()) {
      seen.push([name, entry.kind === 'leaf' ? entry.ref : undefined]);
      if (name === 'a') {
        table.put('a', leaf('A2'));
        table.put('b', leaf('B2'));
        table.delete('c');
      }
    }

    expect(seen).toEqual([
      ['a', 'A1'],
      ['b', 'B2'],
    ]);
  });

  it('refuses writes through a read-only view but shares reads', () => {
    const table = new MemoryCommandTable<string>('guarded', DEFAULT_TABLE_OPTIONS);
    const view = table.readOnlyView();
    table.put('ping', leaf('H1'));

    expect(view.writable).toBe(false);
    expect(view.name).toBe('guarded');
    expect(view.get('ping')).toEqual(leaf('H1'));
    expect(() => view.put('pong', leaf('H2'))).toThrow('Table is not publicly writable: guarded');
    expect(() => view.delete('ping')).toThrow(RegistryError);
    expect(table.get('ping')).toEqual(leaf('H1'));
  });

  it('refuses all access once destroyed', () => {
    const table = new MemoryCommandTable<string>('gone', DEFAULT_TABLE_OPTIONS);
    table.put('ping', leaf('H1'));

    table.destroy();

    expect(table.isDestroyed()).toBe(true);
    expect(() => table.get('ping')).toThrow(RegistryError);
    expect(() => table.size).toThrow('Table has been destroyed: gone');
    expect(() => table.entries().next()).toThrow('Table has been destroyed: gone');
  });
});
