export { EventCursor } from './EventCursor';
export type { CursorResult } from './EventCursor';
export { nextReconnectState, backoffDelay, DEFAULT_BACKOFF } from './reconnect';
export type { ReconnectState, ReconnectEvent, BackoffPolicy } from './reconnect';
export { dispatchEvent } from './dispatch';
export type { EventHandlers } from './dispatch';
