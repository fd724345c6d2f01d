/**
 * Command Table Module
 */

export type { CommandTable } from './command-table.js';
export { MemoryCommandTable } from './command-table.js';
export type { TableOptions } from './table-options.js';
export { DEFAULT_TABLE_NAME, DEFAULT_TABLE_OPTIONS, resolveTableOptions } from './table-options.js';
export { hasTable, listTableNames, resolveTable } from './table-directory.js';
export type { StartupOptions } from './table-owner.js';
export { TableOwner } from './table-owner.js';
