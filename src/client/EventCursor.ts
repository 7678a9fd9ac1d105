import { EventFrame, ReplayRequest } from '../realtime/events';

export type CursorResult =
  | { status: 'applied' }
  | { status: 'duplicate' }
  | { status: 'gap'; request: ReplayRequest };

/**
 * Client-side view of a connection's counter. A frame is applied only when
 * its counter is exactly one past the last applied one.
 */
export class EventCursor {
  private last: number;

  constructor(last = -1) {
    this.last = last;
  }

  get lastApplied(): number {
    return this.last;
  }

  accept(frame: Pick<EventFrame, 'counter'>): CursorResult {
    if (frame.counter <= this.last) {
      return { status: 'duplicate' };
    }
    if (frame.counter !== this.last + 1) {
      return { status: 'gap', request: { replay: this.last } };
    }
    this.last = frame.counter;
    return { status: 'applied' };
  }

  /** After a resync the client refetches state and takes the stream from here. */
  reset(nextCounter: number): void {
    this.last = nextCounter - 1;
  }
}
