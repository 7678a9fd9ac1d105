import { RealtimeConfig } from '../config';
import {
  CloseReason,
  EventFrame,
  ResyncRequired,
  ServerEvent,
  describeEvent,
} from './events';

/**
 * What a connection needs from the underlying socket. `deliver` settles when
 * the client acknowledges the frame and rejects if it does not in time.
 */
export interface EventTransport {
  deliver(frame: EventFrame): Promise<void>;
  signal(control: ResyncRequired): void;
  close(reason: CloseReason): void;
}

export type ConnectionState = 'connected' | 'replaying' | 'disconnected';

/** Counter position and retained frames carried over when a stream resumes. */
export interface StreamSnapshot {
  nextCounter: number;
  retained: EventFrame[];
}

export type ConnectionOptions = Pick<
  RealtimeConfig,
  'retention' | 'maxQueue' | 'pingIntervalMs'
>;

/**
 * One device's event stream over one transport.
 *
 * Frames are delivered one at a time, each waiting for its ack, so a slow
 * client only ever backs up its own queue.
 */
export class DeviceConnection {
  private state: ConnectionState = 'connected';
  private nextCounter: number;
  private retained: EventFrame[];
  private queue: EventFrame[] = [];
  private replayQueue: EventFrame[] = [];
  private pendingReplay: number | null = null;
  private draining = false;
  private pingTimer: NodeJS.Timeout | null = null;
  private closeListeners: Array<(reason: CloseReason) => void> = [];

  constructor(
    readonly userId: string,
    readonly deviceId: string,
    private readonly transport: EventTransport,
    private readonly options: ConnectionOptions,
    resumeFrom?: StreamSnapshot
  ) {
    this.nextCounter = resumeFrom?.nextCounter ?? 0;
    this.retained = resumeFrom ? [...resumeFrom.retained] : [];

    if (options.pingIntervalMs > 0) {
      this.pingTimer = setInterval(() => {
        this.push({ type: 'ping', data: { at: new Date().toISOString() } });
      }, options.pingIntervalMs);
      this.pingTimer.unref();
    }
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get isOpen(): boolean {
    return this.state !== 'disconnected';
  }

  /** Counter the next pushed event will carry. */
  get counter(): number {
    return this.nextCounter;
  }

  onClose(listener: (reason: CloseReason) => void): void {
    this.closeListeners.push(listener);
  }

  snapshot(): StreamSnapshot {
    return { nextCounter: this.nextCounter, retained: [...this.retained] };
  }

  /**
   * Stamp the event with the next counter and queue it. Returns false if the
   * connection is closed or was just closed because its queue is full.
   */
  push(event: ServerEvent): boolean {
    if (!this.isOpen) return false;

    if (this.queue.length >= this.options.maxQueue) {
      console.warn(
        `[Realtime] Queue full for device ${this.deviceId}, dropping connection (${describeEvent(event)})`
      );
      this.close('queue_overflow');
      return false;
    }

    const frame: EventFrame = { ...event, counter: this.nextCounter++ };
    this.retained.push(frame);
    if (this.retained.length > this.options.retention) {
      this.retained.shift();
    }

    this.queue.push(frame);
    this.pump();
    return true;
  }

  /**
   * Resend every retained frame with counter > `after`. Frames still queued
   * are dropped so each is sent once. If the frames after `after` are no
   * longer all retained, or `after` is ahead of this stream, the client is
   * told to resync instead.
   */
  replay(after: number): void {
    if (!this.isOpen) return;

    const oldest = this.retained.length > 0 ? this.retained[0].counter : this.nextCounter;
    if (after >= this.nextCounter) {
      this.transport.signal({ reason: 'ahead_of_server', next_counter: this.nextCounter });
      return;
    }
    if (after + 1 < oldest) {
      this.transport.signal({ reason: 'beyond_retention', next_counter: this.nextCounter });
      return;
    }

    this.pendingReplay = after;
    this.state = 'replaying';
    this.pump();
  }

  close(reason: CloseReason): void {
    if (!this.isOpen) return;
    this.state = 'disconnected';

    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    this.queue = [];
    this.replayQueue = [];
    this.pendingReplay = null;

    this.transport.close(reason);
    for (const listener of this.closeListeners) {
      listener(reason);
    }
    this.closeListeners = [];
  }

  private pump(): void {
    if (this.draining || !this.isOpen) return;
    this.draining = true;
    this.drain().catch((error: unknown) => {
      console.error(`[Realtime] Delivery loop failed for device ${this.deviceId}:`, error);
      this.close('protocol_error');
    });
  }

  private async drain(): Promise<void> {
    try {
      while (this.isOpen) {
        if (this.pendingReplay !== null) {
          const after = this.pendingReplay;
          this.pendingReplay = null;
          this.replayQueue = this.retained.filter((frame) => frame.counter > after);
          this.queue = [];
        }

        const frame = this.replayQueue.shift() ?? this.queue.shift();
        if (!frame) {
          if (this.state === 'replaying') this.state = 'connected';
          return;
        }

        try {
          await this.transport.deliver(frame);
        } catch {
          console.warn(
            `[Realtime] Device ${this.deviceId} did not acknowledge frame ${frame.counter}, closing`
          );
          this.close('ack_timeout');
          return;
        }

        if (
          this.state === 'replaying' &&
          this.replayQueue.length === 0 &&
          this.pendingReplay === null
        ) {
          this.state = 'connected';
        }
      }
    } finally {
      // Reset in the same tick the loop exits; a later push starts a new loop.
      this.draining = false;
    }
  }
}
