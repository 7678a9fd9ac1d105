import { DeviceConnection, ConnectionOptions } from '../realtime/DeviceConnection';
import { ConnectionManager } from '../realtime/ConnectionManager';
import { ServerEvent, parseReplayRequest, describeEvent } from '../realtime/events';
import { FakeTransport, flush } from './helpers';

const options: ConnectionOptions = { retention: 8, maxQueue: 4, pingIntervalMs: 0 };

const managerOptions = {
  retention: 8,
  maxQueue: 4,
  ackTimeoutMs: 1000,
  pingIntervalMs: 0,
  resumeGraceMs: 60_000,
};

function ping(n: number): ServerEvent {
  return { type: 'ping', data: { at: `t${n}` } };
}

async function pushMany(connection: DeviceConnection, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    connection.push(ping(i));
    await flush();
  }
}

describe('DeviceConnection', () => {
  it('numbers frames from 0 in push order', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);

    await pushMany(connection, 3);

    expect(transport.counters).toEqual([0, 1, 2]);
    expect(transport.frames[1]).toEqual({ counter: 1, type: 'ping', data: { at: 't1' } });
    expect(connection.counter).toBe(3);
  });

  it('replays every retained frame after the requested counter, in order', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);
    await pushMany(connection, 5);

    connection.replay(1);
    await flush();

    expect(transport.counters).toEqual([0, 1, 2, 3, 4, 2, 3, 4]);
    expect(connection.currentState).toBe('connected');
  });

  it('replays the whole stream for a replay of -1', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);
    await pushMany(connection, 2);

    connection.replay(-1);
    await flush();

    expect(transport.counters).toEqual([0, 1, 0, 1]);
  });

  it('sends queued frames once when a replay arrives behind an in-flight delivery', async () => {
    const transport = new FakeTransport(false);
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);

    connection.push(ping(0));
    connection.push(ping(1));
    connection.push(ping(2));
    connection.replay(0);
    expect(connection.currentState).toBe('replaying');

    await transport.ack();
    await transport.ack();
    await transport.ack();

    expect(transport.counters).toEqual([0, 1, 2]);
    expect(connection.currentState).toBe('connected');
  });

  it('asks for a resync when the gap is older than the retention window', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, {
      ...options,
      retention: 3,
    });
    await pushMany(connection, 6);

    connection.replay(1);
    await flush();

    expect(transport.signals).toEqual([{ reason: 'beyond_retention', next_counter: 6 }]);
    expect(transport.frames).toHaveLength(6);
  });

  it('replays from the oldest retained frame when the gap just fits', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, {
      ...options,
      retention: 3,
    });
    await pushMany(connection, 6);

    connection.replay(2);
    await flush();

    expect(transport.signals).toEqual([]);
    expect(transport.counters.slice(6)).toEqual([3, 4, 5]);
  });

  it('asks for a resync when the client claims a counter the server never issued', async () => {
    const transport = new FakeTransport();
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);
    await pushMany(connection, 2);

    connection.replay(2);

    expect(transport.signals).toEqual([{ reason: 'ahead_of_server', next_counter: 2 }]);
  });

  it('closes itself when its outbound queue overflows', async () => {
    const transport = new FakeTransport(false);
    const connection = new DeviceConnection('user-1', 'device-1', transport, {
      ...options,
      maxQueue: 2,
    });

    // Frame 0 is in flight; 1 and 2 fill the queue.
    expect(connection.push(ping(0))).toBe(true);
    expect(connection.push(ping(1))).toBe(true);
    expect(connection.push(ping(2))).toBe(true);
    expect(connection.push(ping(3))).toBe(false);

    expect(transport.closedWith).toBe('queue_overflow');
    expect(connection.isOpen).toBe(false);
    expect(connection.push(ping(4))).toBe(false);
  });

  it('closes itself when a frame is not acknowledged', async () => {
    const transport = new FakeTransport(false);
    const connection = new DeviceConnection('user-1', 'device-1', transport, options);
    const reasons: string[] = [];
    connection.onClose((reason) => reasons.push(reason));

    connection.push(ping(0));
    await transport.fail();

    expect(transport.closedWith).toBe('ack_timeout');
    expect(reasons).toEqual(['ack_timeout']);
    expect(connection.currentState).toBe('disconnected');
  });

  it('pushes a counted ping on every heartbeat interval', () => {
    jest.useFakeTimers();
    try {
      const transport = new FakeTransport();
      const connection = new DeviceConnection('user-1', 'device-1', transport, {
        ...options,
        pingIntervalMs: 1000,
      });

      jest.advanceTimersByTime(3500);
      expect(connection.counter).toBe(3);
      expect(transport.frames[0].type).toBe('ping');

      connection.close('server_shutdown');
      jest.advanceTimersByTime(5000);
      expect(connection.counter).toBe(3);
    } finally {
      jest.useRealTimers();
    }
  });
});

describe('ConnectionManager', () => {
  let manager: ConnectionManager;

  beforeEach(() => {
    manager = new ConnectionManager(managerOptions);
  });

  afterEach(() => {
    manager.closeAll();
  });

  it('delivers to every online device of the notified users', async () => {
    const a1 = new FakeTransport();
    const a2 = new FakeTransport();
    const b1 = new FakeTransport();
    manager.attach('alice', 'a1', a1);
    manager.attach('alice', 'a2', a2);
    manager.attach('bob', 'b1', b1);

    const delivered = manager.notifyUsers(['alice', 'alice'], ping(0));
    await flush();

    expect(delivered).toBe(2);
    expect(a1.frames).toHaveLength(1);
    expect(a2.frames).toHaveLength(1);
    expect(b1.frames).toHaveLength(0);
  });

  it('replaces an older connection for the same device and continues its stream', async () => {
    const first = new FakeTransport();
    const second = new FakeTransport();
    manager.attach('alice', 'a1', first);
    manager.sendToDevice('a1', ping(0));
    manager.sendToDevice('a1', ping(1));
    await flush();

    const replacement = manager.attach('alice', 'a1', second);
    expect(first.closedWith).toBe('replaced');
    expect(manager.connectionCount).toBe(1);

    replacement.replay(0);
    manager.sendToDevice('a1', ping(2));
    await flush();

    expect(second.counters).toEqual([1, 2]);
  });

  it('lets a device that reconnects within the grace period replay what it missed', async () => {
    const first = new FakeTransport();
    const connection = manager.attach('alice', 'a1', first);
    for (let i = 0; i < 4; i++) manager.sendToDevice('a1', ping(i));
    await flush();

    connection.close('client_disconnect');
    expect(manager.isOnline('a1')).toBe(false);

    const second = new FakeTransport();
    const resumed = manager.attach('alice', 'a1', second);
    resumed.replay(1);
    await flush();

    expect(second.counters).toEqual([2, 3]);
    expect(resumed.counter).toBe(4);
  });

  it('starts a fresh stream when no grace period is configured', () => {
    const noGrace = new ConnectionManager({ ...managerOptions, resumeGraceMs: 0 });
    const first = new FakeTransport();
    noGrace.attach('alice', 'a1', first).push(ping(0));
    noGrace.disconnectDevice('a1', 'client_disconnect');

    const second = new FakeTransport();
    const fresh = noGrace.attach('alice', 'a1', second);
    fresh.replay(0);

    expect(fresh.counter).toBe(0);
    expect(second.signals).toEqual([{ reason: 'ahead_of_server', next_counter: 0 }]);
    noGrace.closeAll();
  });

  it('does not resume a removed device', () => {
    const first = new FakeTransport();
    manager.attach('alice', 'a1', first).push(ping(0));
    manager.disconnectDevice('a1', 'device_removed');

    const fresh = manager.attach('alice', 'a1', new FakeTransport());
    expect(first.closedWith).toBe('device_removed');
    expect(fresh.counter).toBe(0);
  });

  it('isolates a slow device: only its connection is dropped', async () => {
    const slow = new FakeTransport(false);
    const fast = new FakeTransport();
    manager.attach('alice', 'slow', slow);
    manager.attach('alice', 'fast', fast);

    const counts: number[] = [];
    for (let i = 0; i < 6; i++) {
      counts.push(manager.notifyUsers(['alice'], ping(i)));
      await flush();
    }

    // maxQueue 4: one frame in flight plus four queued, the sixth overflows.
    expect(counts).toEqual([2, 2, 2, 2, 2, 1]);
    expect(slow.closedWith).toBe('queue_overflow');
    expect(manager.isOnline('slow')).toBe(false);
    expect(fast.counters).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('closes every connection of a user', () => {
    const a1 = new FakeTransport();
    const a2 = new FakeTransport();
    const b1 = new FakeTransport();
    manager.attach('alice', 'a1', a1);
    manager.attach('alice', 'a2', a2);
    manager.attach('bob', 'b1', b1);

    manager.disconnectUser('alice', 'account_deleted');

    expect(a1.closedWith).toBe('account_deleted');
    expect(a2.closedWith).toBe('account_deleted');
    expect(b1.closedWith).toBeNull();
    expect(manager.connectionCount).toBe(1);
  });
});

describe('event helpers', () => {
  it('accepts only integer replay requests of -1 or more', () => {
    expect(parseReplayRequest({ replay: 5 })).toEqual({ replay: 5 });
    expect(parseReplayRequest({ replay: -1 })).toEqual({ replay: -1 });
    expect(parseReplayRequest({ replay: -2 })).toBeNull();
    expect(parseReplayRequest({ replay: 1.5 })).toBeNull();
    expect(parseReplayRequest({ replay: '3' })).toBeNull();
    expect(parseReplayRequest('{"replay":3}')).toBeNull();
    expect(parseReplayRequest(null)).toBeNull();
  });

  it('labels events for logs', () => {
    expect(describeEvent(ping(0))).toBe('ping');
  });
});
