/**
 * Debug event emitter singleton.
 * Provides the core event emission mechanism for registry instrumentation.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugEvent, DebugContext, EventFilter } from './types.js';

/**
 * DebugEmitter manages debug event emission.
 * It can be enabled/disabled and maintains context for event correlation.
 */
export class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};

  /**
   * Enable debug mode. Events will only be emitted when enabled.
   */
  enable(): void {
    this._enabled = true;
  }

  /**
   * Disable debug mode. Events will not be emitted when disabled.
   */
  disable(): void {
    this._enabled = false;
  }

  isEnabled(): boolean {
    return this._enabled;
  }

  /**
   * Set the current context for event correlation.
   * Context fields are automatically added to all emitted events.
   * @param ctx - Context to merge with existing context
   */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  getContext(): DebugContext {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Emit a debug event.
   * @param type - Event type in format "domain.action"
   * @param source - Source module identifier
   * @param data - Event-specific data payload
   * @param tableName - Table the event concerns; overrides the context value
   * @returns true if event was emitted, false if debug is disabled
   */
  emitDebug(type: string, source: string, data: Record<string, unknown>, tableName?: string): boolean {
    if (!this._enabled) {
      return false;
    }

    const resolvedTable = tableName ?? this.context.tableName;
    const event: DebugEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      type,
      source,
      data,
      ...(resolvedTable && { tableName: resolvedTable }),
      ...(this.context.caller && { caller: this.context.caller }),
    };

    return super.emit('debug', event);
  }

  onDebug(handler: (event: DebugEvent) => void): void {
    this.on('debug', handler);
  }

  offDebug(handler: (event: DebugEvent) => void): void {
    this.off('debug', handler);
  }
}

/**
 * Check whether an event passes a filter. Type filters ending in "." match
 * by prefix.
 */
export function matchesFilter(event: DebugEvent, filter: EventFilter): boolean {
  if (filter.type !== undefined) {
    const typeMatches = filter.type.endsWith('.')
      ? event.type.startsWith(filter.type)
      : event.type === filter.type;
    if (!typeMatches) return false;
  }
  if (filter.source !== undefined && event.source !== filter.source) return false;
  if (filter.tableName !== undefined && event.tableName !== filter.tableName) return false;
  return true;
}

// Singleton instance
export const debugEmitter = new DebugEmitter();
