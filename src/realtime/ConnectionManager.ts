import { config, RealtimeConfig } from '../config';
import { DeviceConnection, EventTransport, StreamSnapshot } from './DeviceConnection';
import { CloseReason, ServerEvent } from './events';

interface ParkedStream extends StreamSnapshot {
  userId: string;
  timer: NodeJS.Timeout;
}

/** Close reasons after which the device may come back and resume its stream. */
const RESUMABLE: ReadonlySet<CloseReason> = new Set<CloseReason>([
  'client_disconnect',
  'ack_timeout',
  'queue_overflow',
]);

/**
 * Registry of live device connections. Services reach devices only through
 * this class; it never blocks on a slow connection.
 */
export class ConnectionManager {
  private readonly connections = new Map<string, DeviceConnection>();
  private readonly devicesByUser = new Map<string, Set<string>>();
  private readonly parked = new Map<string, ParkedStream>();

  constructor(private readonly options: RealtimeConfig) {}

  /**
   * Bind a transport to a device. An existing connection for the device is
   * closed and its stream continues on the new one, as does a stream parked
   * after a recent disconnect.
   */
  attach(userId: string, deviceId: string, transport: EventTransport): DeviceConnection {
    let resumeFrom: StreamSnapshot | undefined;

    const existing = this.connections.get(deviceId);
    if (existing) {
      resumeFrom = existing.snapshot();
      this.unregister(existing);
      existing.close('replaced');
      console.log(`[Realtime] Device ${deviceId} reconnected, replacing previous connection`);
    } else {
      resumeFrom = this.takeParked(deviceId, userId);
    }

    const connection = new DeviceConnection(userId, deviceId, transport, this.options, resumeFrom);
    this.connections.set(deviceId, connection);
    let devices = this.devicesByUser.get(userId);
    if (!devices) {
      devices = new Set();
      this.devicesByUser.set(userId, devices);
    }
    devices.add(deviceId);

    connection.onClose((reason) => this.handleClosed(connection, reason));
    return connection;
  }

  sendToDevice(deviceId: string, event: ServerEvent): boolean {
    const connection = this.connections.get(deviceId);
    return connection ? connection.push(event) : false;
  }

  /** Push to every online device of the given users. Returns how many accepted it. */
  notifyUsers(userIds: Iterable<string>, event: ServerEvent): number {
    let delivered = 0;
    for (const userId of new Set(userIds)) {
      for (const deviceId of [...(this.devicesByUser.get(userId) ?? [])]) {
        if (this.sendToDevice(deviceId, event)) delivered++;
      }
    }
    return delivered;
  }

  disconnectDevice(deviceId: string, reason: CloseReason): void {
    this.dropParked(deviceId);
    this.connections.get(deviceId)?.close(reason);
  }

  disconnectUser(userId: string, reason: CloseReason): void {
    for (const [deviceId, stream] of this.parked) {
      if (stream.userId === userId) this.dropParked(deviceId);
    }
    for (const deviceId of [...(this.devicesByUser.get(userId) ?? [])]) {
      this.connections.get(deviceId)?.close(reason);
    }
  }

  isOnline(deviceId: string): boolean {
    return this.connections.has(deviceId);
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  closeAll(reason: CloseReason = 'server_shutdown'): void {
    for (const deviceId of [...this.parked.keys()]) {
      this.dropParked(deviceId);
    }
    for (const connection of [...this.connections.values()]) {
      connection.close(reason);
    }
  }

  private handleClosed(connection: DeviceConnection, reason: CloseReason): void {
    // A replaced connection was already unregistered.
    if (this.connections.get(connection.deviceId) !== connection) return;
    this.unregister(connection);
    console.log(`[Realtime] Device ${connection.deviceId} disconnected (${reason})`);

    if (RESUMABLE.has(reason) && this.options.resumeGraceMs > 0) {
      this.park(connection);
    }
  }

  private unregister(connection: DeviceConnection): void {
    this.connections.delete(connection.deviceId);
    const devices = this.devicesByUser.get(connection.userId);
    if (!devices) return;
    devices.delete(connection.deviceId);
    if (devices.size === 0) this.devicesByUser.delete(connection.userId);
  }

  private park(connection: DeviceConnection): void {
    this.dropParked(connection.deviceId);
    const timer = setTimeout(() => {
      this.parked.delete(connection.deviceId);
    }, this.options.resumeGraceMs);
    timer.unref();
    this.parked.set(connection.deviceId, {
      ...connection.snapshot(),
      userId: connection.userId,
      timer,
    });
  }

  private takeParked(deviceId: string, userId: string): StreamSnapshot | undefined {
    const stream = this.parked.get(deviceId);
    if (!stream) return undefined;
    this.dropParked(deviceId);
    if (stream.userId !== userId) return undefined;
    return { nextCounter: stream.nextCounter, retained: stream.retained };
  }

  private dropParked(deviceId: string): void {
    const stream = this.parked.get(deviceId);
    if (!stream) return;
    clearTimeout(stream.timer);
    this.parked.delete(deviceId);
  }
}

export const connectionManager = new ConnectionManager(config.realtime);
