/**
 * Debug instrumentation API.
 *
 * Registry modules emit debug events here; anything interested subscribes
 * through `debugEmitter.onDebug`.
 *
 * @example
 * ```typescript
 * import { debug, debugEmitter } from './debug/index.js';
 *
 * debugEmitter.enable();
 * debugEmitter.onDebug((event) => console.log(event.type, event.data));
 *
 * debug.setContext({ caller: 'moderation-plugin' });
 * ```
 */

export { debugEmitter, DebugEmitter, matchesFilter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugContext, EventFilter } from './types.js';
