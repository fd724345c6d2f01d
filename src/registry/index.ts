/**
 * Command Registry Module
 */

export type {
  CommandEntry,
  CommandGroup,
  CommandLeaf,
  CommandPath,
  CommandTreeObject,
} from './types.js';
export { entryToObject, formatPath, group, groupFromMap, isGroup, isLeaf, leaf } from './types.js';
export type { InsertOutcome, RemoveOutcome } from './path-resolver.js';
export { insertEntry, isEmptyEntry, removeEntry } from './path-resolver.js';
export type { StorageResult } from './operations.js';
export { addCommand, allCommands, lookupCommand, removeCommand } from './operations.js';
export type { ErrorCode, LeafCollisionData, RegistryOperation } from './errors.js';
export { ErrorCodes, ErrorMessages, RegistryError, isLeafCollision, isRegistryError } from './errors.js';
