import { TableCommandStorage } from '../../src/storage/table-storage.js';
import type { CommandStorage } from '../../src/storage/types.js';
import { TableOwner } from '../../src/table/table-owner.js';
import { ErrorCodes, RegistryError } from '../../src/registry/errors.js';
import { entryToObject, group, leaf } from '../../src/registry/types.js';

type Handler = { run: () => string };

const banHandler: Handler = { run: () => 'banned' };
const kickHandler: Handler = { run: () => 'kicked' };

describe('TableCommandStorage', () => {
  let owner: TableOwner<Handler> | undefined;

  afterEach(() => {
    owner?.stop();
    owner = undefined;
  });

  it('uses the well-known table when given no handle', () => {
    owner = TableOwner.start<Handler>();
    const storage: CommandStorage<Handler> = new TableCommandStorage<Handler>();

    expect(storage.addCommand(['mod', 'ban'], banHandler)).toEqual({ success: true });

    expect(owner.getTableHandle().get('mod')).toEqual(group({ ban: leaf(banHandler) }));
  });

  it('can be created before the owner starts', () => {
    const storage = new TableCommandStorage<Handler>();

    expect(() => storage.lookupCommand('mod')).toThrow(RegistryError);

    owner = TableOwner.start<Handler>();
    expect(storage.lookupCommand('mod')).toBeUndefined();
  });

  it('throws TABLE_NOT_FOUND once the owner is gone', () => {
    owner = TableOwner.start<Handler>('short_lived');
    const storage = new TableCommandStorage<Handler>('short_lived');
    storage.addCommand(['ping'], banHandler);

    owner.stop();

    expect(() => storage.allCommands()).toThrow('Table not found: short_lived');
  });

  it('works against an explicit handle without touching the directory', () => {
    owner = TableOwner.start<Handler>('private', { globallyNamed: false });
    const storage = new TableCommandStorage<Handler>(owner.getTableHandle());

    storage.addCommand(['mod', 'ban'], banHandler);
    storage.addCommand(['mod', 'kick'], kickHandler);

    const all = storage.allCommands();
    expect(Array.from(all.keys())).toEqual(['mod']);
    const mod = all.get('mod');
    expect(mod && entryToObject(mod)).toEqual({ ban: banHandler, kick: kickHandler });
  });

  it('stores refs verbatim', () => {
    owner = TableOwner.start<Handler>();
    const storage = new TableCommandStorage<Handler>();

    storage.addCommand(['mod', 'ban'], banHandler);

    const mod = storage.lookupCommand('mod');
    const ban = mod?.kind === 'group' ? mod.children.get('ban') : undefined;
    expect(ban?.kind === 'leaf' ? ban.ref : undefined).toBe(banHandler);
  });

  it('hands collisions back as results and keeps the old entry', () => {
    owner = TableOwner.start<Handler>();
    const storage = new TableCommandStorage<Handler>();
    storage.addCommand(['ban'], banHandler);

    const result = storage.addCommand(['ban', 'temp'], kickHandler);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCodes.LEAF_COLLISION);
    }
    expect(storage.lookupCommand('ban')).toEqual(leaf(banHandler));
  });

  it('removes commands and prunes the emptied group', () => {
    owner = TableOwner.start<Handler>();
    const storage = new TableCommandStorage<Handler>();
    storage.addCommand(['mod', 'ban'], banHandler);
    storage.addCommand(['mod', 'kick'], kickHandler);

    expect(storage.removeCommand(['mod', 'ban'])).toEqual({ success: true });
    expect(storage.lookupCommand('mod')).toEqual(group({ kick: leaf(kickHandler) }));

    expect(storage.removeCommand(['mod', 'kick'])).toEqual({ success: true });
    expect(storage.allCommands().size).toBe(0);
  });
});
