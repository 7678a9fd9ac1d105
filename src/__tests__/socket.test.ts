import { createServer, Server as HttpServer } from 'http';
import { io as connect, Socket as ClientSocket } from 'socket.io-client';
import { initSocket, RelayServer, ServerToClientEvents, ClientToServerEvents } from '../socket';
import { ConnectionManager } from '../realtime/ConnectionManager';
import { EventFrame, ResyncRequired } from '../realtime/events';
import { createUser, login, TestUser } from './helpers';

type TestClient = ClientSocket<ServerToClientEvents, ClientToServerEvents>;

describe('socket.io gateway', () => {
  let httpServer: HttpServer;
  let io: RelayServer;
  let manager: ConnectionManager;
  let url: string;
  let alice: TestUser;
  let token: string;
  const clients: TestClient[] = [];

  function open(auth: Record<string, unknown>): TestClient {
    const client: TestClient = connect(url, {
      auth,
      transports: ['websocket'],
      reconnection: false,
      forceNew: true,
    });
    clients.push(client);
    return client;
  }

  function connected(client: TestClient): Promise<void> {
    return new Promise((resolve, reject) => {
      client.once('connect', () => resolve());
      client.once('connect_error', reject);
    });
  }

  /** Collect `count` frames, acknowledging each. */
  function frames(client: TestClient, count: number): Promise<EventFrame[]> {
    return new Promise((resolve) => {
      const received: EventFrame[] = [];
      const onFrame = (frame: EventFrame, ack: () => void) => {
        ack();
        received.push(frame);
        if (received.length === count) {
          client.off('event', onFrame);
          resolve(received);
        }
      };
      client.on('event', onFrame);
    });
  }

  beforeAll(async () => {
    manager = new ConnectionManager({
      retention: 16,
      maxQueue: 16,
      ackTimeoutMs: 2000,
      pingIntervalMs: 0,
      resumeGraceMs: 0,
    });
    httpServer = createServer();
    io = initSocket(httpServer, manager);
    await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
    const address = httpServer.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected the test server to listen on a TCP port');
    }
    url = `http://127.0.0.1:${address.port}`;
  });

  beforeEach(async () => {
    alice = await createUser('alice');
    token = await login(alice);
  });

  afterEach(() => {
    while (clients.length > 0) clients.pop()?.disconnect();
    manager.closeAll();
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => io.close(() => resolve()));
  });

  it('delivers pushed events as counted frames', async () => {
    const client = open({ token, deviceId: alice.device.device_id });
    await connected(client);
    const received = frames(client, 2);

    manager.sendToDevice(alice.device.device_id, { type: 'ping', data: { at: 'first' } });
    manager.sendToDevice(alice.device.device_id, { type: 'ping', data: { at: 'second' } });

    expect(await received).toEqual([
      { counter: 0, type: 'ping', data: { at: 'first' } },
      { counter: 1, type: 'ping', data: { at: 'second' } },
    ]);
  });

  it('resends frames after the counter named in a replay request', async () => {
    const client = open({ token, deviceId: alice.device.device_id });
    await connected(client);
    const initial = frames(client, 3);
    for (const at of ['a', 'b', 'c']) {
      manager.sendToDevice(alice.device.device_id, { type: 'ping', data: { at } });
    }
    await initial;

    const replayed = frames(client, 2);
    client.emit('replay', { replay: 0 });

    expect((await replayed).map((frame) => frame.counter)).toEqual([1, 2]);
  });

  it('signals a resync for a counter the connection never issued', async () => {
    const client = open({ token, deviceId: alice.device.device_id });
    await connected(client);
    const resync = new Promise<ResyncRequired>((resolve) => client.once('resync_required', resolve));

    client.emit('replay', { replay: 41 });

    expect(await resync).toEqual({ reason: 'ahead_of_server', next_counter: 0 });
  });

  it('closes the connection on a malformed replay request', async () => {
    const client = open({ token, deviceId: alice.device.device_id });
    await connected(client);
    const closed = new Promise<string>((resolve) => client.once('disconnect', resolve));

    client.emit('replay', { replay: 'soon' });

    expect(await closed).toBe('io server disconnect');
    expect(manager.isOnline(alice.device.device_id)).toBe(false);
  });

  it('replaces the older socket when the same device connects again', async () => {
    const first = open({ token, deviceId: alice.device.device_id });
    await connected(first);
    const firstClosed = new Promise<string>((resolve) => first.once('disconnect', resolve));

    const second = open({ token, deviceId: alice.device.device_id });
    await connected(second);

    expect(await firstClosed).toBe('io server disconnect');
    expect(manager.connectionCount).toBe(1);
  });

  it('refuses a handshake without a valid session', async () => {
    const client = open({ token: 'not-a-token', deviceId: alice.device.device_id });

    await expect(connected(client)).rejects.toThrow('Invalid or expired session');
  });

  it('refuses a device that belongs to another user', async () => {
    const bob = await createUser('bob');
    const client = open({ token, deviceId: bob.device.device_id });

    await expect(connected(client)).rejects.toThrow('Unknown device');
  });
});
