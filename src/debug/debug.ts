/**
 * Convenient debug API for instrumentation.
 * Provides typed methods for emitting registry events.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext } from './types.js';
import type { CommandPath } from '../registry/types.js';
import type { RegistryError } from '../registry/errors.js';

/**
 * Debug API object with convenience methods for common event types.
 */
export const debug = {
  // ========== State Management ==========

  get enabled(): boolean {
    return debugEmitter.isEnabled();
  },

  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  getContext(): DebugContext {
    return debugEmitter.getContext();
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // ========== Table Events ==========

  /**
   * Emit table.created event.
   */
  tableCreated(tableName: string, options: Record<string, unknown>): void {
    debugEmitter.emitDebug('table.created', 'table-owner', { options }, tableName);
  },

  /**
   * Emit table.destroyed event.
   */
  tableDestroyed(tableName: string, entryCount: number): void {
    debugEmitter.emitDebug('table.destroyed', 'table-owner', { entryCount }, tableName);
  },

  // ========== Command Events ==========

  commandAdded(tableName: string, path: CommandPath): void {
    debugEmitter.emitDebug('command.added', 'registry', { path: [...path] }, tableName);
  },

  /**
   * Emit command.removed event. `pruned` is true when the top-level key was dropped.
   */
  commandRemoved(tableName: string, path: CommandPath, pruned: boolean): void {
    debugEmitter.emitDebug('command.removed', 'registry', { path: [...path], pruned }, tableName);
  },

  commandRejected(tableName: string, path: CommandPath, error: RegistryError): void {
    debugEmitter.emitDebug(
      'command.rejected',
      'registry',
      { path: [...path], code: error.code, message: error.message },
      tableName
    );
  },
};
