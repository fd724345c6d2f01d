/**
 * Debug event types for registry instrumentation.
 */

/**
 * Base debug event structure.
 */
export interface DebugEvent {
  /** Unique event identifier (UUID) */
  id: string;
  /** Event timestamp in milliseconds */
  timestamp: number;
  /** Event type in format "domain.action" (e.g., "command.added", "table.created") */
  type: string;
  /** Source module identifier (e.g., "registry", "table-owner") */
  source: string;
  /** Event-specific data payload */
  data: Record<string, unknown>;
  /** Table the event concerns (if applicable) */
  tableName?: string;
  /** Caller label set through the context (if any) */
  caller?: string;
}

/**
 * Context merged into every emitted event.
 */
export interface DebugContext {
  tableName?: string;
  caller?: string;
}

/**
 * Filter options for collected events.
 */
export interface EventFilter {
  /** Filter by event type (prefix match supported) */
  type?: string;
  /** Filter by source module */
  source?: string;
  /** Filter by table name */
  tableName?: string;
}
