/**
 * Command Storage Module
 */

export type { CommandStorage } from './types.js';
export { TableCommandStorage } from './table-storage.js';
