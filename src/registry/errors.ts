/**
 * Registry Error Codes and Classes
 *
 * Leaf collisions and invalid paths are handed back to callers as result
 * values. Table lifecycle errors are thrown: a missing or stopped owner is
 * fatal to every caller of its table.
 */

import type { CommandPath } from './types.js';
import { formatPath } from './types.js';

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  // Path errors
  LEAF_COLLISION: 'LEAF_COLLISION',
  INVALID_PATH: 'INVALID_PATH',

  // Table lifecycle errors
  TABLE_EXISTS: 'TABLE_EXISTS',
  TABLE_NOT_FOUND: 'TABLE_NOT_FOUND',
  TABLE_DESTROYED: 'TABLE_DESTROYED',
  TABLE_PROTECTED: 'TABLE_PROTECTED',
  INVALID_TABLE_OPTIONS: 'INVALID_TABLE_OPTIONS',
  OWNER_STOPPED: 'OWNER_STOPPED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Error Messages
// ============================================================================

export const ErrorMessages: Record<ErrorCode, string> = {
  [ErrorCodes.LEAF_COLLISION]: 'Path descends through a leaf command',
  [ErrorCodes.INVALID_PATH]: 'Invalid command path',

  [ErrorCodes.TABLE_EXISTS]: 'Table already exists',
  [ErrorCodes.TABLE_NOT_FOUND]: 'Table not found',
  [ErrorCodes.TABLE_DESTROYED]: 'Table has been destroyed',
  [ErrorCodes.TABLE_PROTECTED]: 'Table is not publicly writable',
  [ErrorCodes.INVALID_TABLE_OPTIONS]: 'Invalid table options',
  [ErrorCodes.OWNER_STOPPED]: 'Table owner has stopped',
};

export type RegistryOperation = 'add' | 'remove';

export interface LeafCollisionData {
  /** Top-level command that blocks the path */
  name: string;
  /** Attempted subpath below the top-level command */
  path: string[];
  /** Full path of the leaf that was found */
  blockingPath: string[];
  operation: RegistryOperation;
}

// ============================================================================
// RegistryError Class
// ============================================================================

export class RegistryError extends Error {
  readonly code: ErrorCode;
  readonly data?: unknown;

  constructor(code: ErrorCode, message?: string, data?: unknown) {
    super(message || ErrorMessages[code]);
    this.name = 'RegistryError';
    this.code = code;
    this.data = data;
  }

  static fromCode(code: ErrorCode, data?: unknown): RegistryError {
    return new RegistryError(code, ErrorMessages[code], data);
  }

  static leafCollision(
    name: string,
    subpath: CommandPath,
    blockingPath: CommandPath,
    operation: RegistryOperation
  ): RegistryError {
    const data: LeafCollisionData = {
      name,
      path: [...subpath],
      blockingPath: [...blockingPath],
      operation,
    };

    const message =
      blockingPath.length <= 1
        ? `Command \`${name}\` is a top-level command, cannot ${operation} subcommand at \`${formatPath(subpath)}\``
        : `Command \`${formatPath(blockingPath)}\` is a leaf command, cannot ${operation} subcommand at \`${formatPath(
            [name, ...subpath].slice(blockingPath.length)
          )}\``;

    return new RegistryError(ErrorCodes.LEAF_COLLISION, message, data);
  }

  static invalidPath(details?: string): RegistryError {
    return new RegistryError(
      ErrorCodes.INVALID_PATH,
      details ? `Invalid command path: ${details}` : undefined
    );
  }

  static tableExists(tableName: string): RegistryError {
    return new RegistryError(ErrorCodes.TABLE_EXISTS, `Table already exists: ${tableName}`, { tableName });
  }

  static tableNotFound(tableName: string): RegistryError {
    return new RegistryError(ErrorCodes.TABLE_NOT_FOUND, `Table not found: ${tableName}`, { tableName });
  }

  static tableDestroyed(tableName: string): RegistryError {
    return new RegistryError(ErrorCodes.TABLE_DESTROYED, `Table has been destroyed: ${tableName}`, { tableName });
  }

  static tableProtected(tableName: string): RegistryError {
    return new RegistryError(
      ErrorCodes.TABLE_PROTECTED,
      `Table is not publicly writable: ${tableName}`,
      { tableName }
    );
  }

  static invalidTableOptions(errors: Array<{ path: string; message: string }>): RegistryError {
    return new RegistryError(
      ErrorCodes.INVALID_TABLE_OPTIONS,
      `Invalid table options: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      { errors }
    );
  }

  static ownerStopped(tableName: string): RegistryError {
    return new RegistryError(ErrorCodes.OWNER_STOPPED, `Table owner has stopped: ${tableName}`, { tableName });
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

export function isLeafCollision(error: unknown): error is RegistryError & { data: LeafCollisionData } {
  return isRegistryError(error) && error.code === ErrorCodes.LEAF_COLLISION;
}
