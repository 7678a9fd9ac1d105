export type ReconnectState =
  | { kind: 'disconnected' }
  | { kind: 'backoff'; attempt: number; delayMs: number }
  | { kind: 'connecting'; attempt: number }
  | { kind: 'connected' };

export type ReconnectEvent =
  | { type: 'start' }
  | { type: 'timer_elapsed' }
  | { type: 'opened' }
  | { type: 'failed' }
  | { type: 'lost' }
  | { type: 'stop' };

export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 500, capMs: 30_000 };

/** min(base * 2^attempt, cap) */
export function backoffDelay(attempt: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
  return Math.min(policy.baseMs * 2 ** attempt, policy.capMs);
}

/**
 * Pure transition function for a client's connection lifecycle. Events that
 * make no sense in the current state leave it unchanged.
 */
export function nextReconnectState(
  state: ReconnectState,
  event: ReconnectEvent,
  policy: BackoffPolicy = DEFAULT_BACKOFF
): ReconnectState {
  if (event.type === 'stop') return { kind: 'disconnected' };

  switch (state.kind) {
    case 'disconnected':
      return event.type === 'start' ? { kind: 'connecting', attempt: 0 } : state;

    case 'connecting':
      if (event.type === 'opened') return { kind: 'connected' };
      if (event.type === 'failed') {
        return {
          kind: 'backoff',
          attempt: state.attempt,
          delayMs: backoffDelay(state.attempt, policy),
        };
      }
      return state;

    case 'backoff':
      return event.type === 'timer_elapsed'
        ? { kind: 'connecting', attempt: state.attempt + 1 }
        : state;

    case 'connected':
      return event.type === 'lost'
        ? { kind: 'backoff', attempt: 0, delayMs: backoffDelay(0, policy) }
        : state;
  }
}
