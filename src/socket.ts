import { Server as HttpServer } from 'http';
import { Server, Socket } from 'socket.io';
import { config } from './config';
import { Device } from './models';
import { AuthService } from './services/AuthService';
import { ConnectionManager, connectionManager } from './realtime/ConnectionManager';
import { EventTransport } from './realtime/DeviceConnection';
import { CloseReason, EventFrame, ResyncRequired, parseReplayRequest } from './realtime/events';

export interface ServerToClientEvents {
  event: (frame: EventFrame, ack: () => void) => void;
  resync_required: (control: ResyncRequired) => void;
  closing: (payload: { reason: CloseReason }) => void;
}

export interface ClientToServerEvents {
  replay: (request: unknown) => void;
}

export interface SocketData {
  userId: string;
  deviceId: string;
}

type RelaySocket = Socket<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketData>;
export type RelayServer = Server<
  ClientToServerEvents,
  ServerToClientEvents,
  Record<string, never>,
  SocketData
>;

/** Adapts a socket.io socket to the connection's transport contract. */
export function socketTransport(socket: RelaySocket, ackTimeoutMs: number): EventTransport {
  return {
    async deliver(frame) {
      await socket.timeout(ackTimeoutMs).emitWithAck('event', frame);
    },
    signal(control) {
      socket.emit('resync_required', control);
    },
    close(reason) {
      if (!socket.connected) return;
      socket.emit('closing', { reason });
      socket.disconnect(true);
    },
  };
}

/**
 * Attach socket.io to the HTTP server. Clients authenticate in the
 * handshake with `auth: { token, deviceId }`.
 */
export function initSocket(
  httpServer: HttpServer,
  manager: ConnectionManager = connectionManager
): RelayServer {
  const io: RelayServer = new Server<
    ClientToServerEvents,
    ServerToClientEvents,
    Record<string, never>,
    SocketData
  >(httpServer, {
    cors: {
      origin: config.server.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io.use(async (socket, next) => {
    try {
      const auth: unknown = socket.handshake.auth;
      const token = typeof auth === 'object' && auth !== null && 'token' in auth ? auth.token : undefined;
      const deviceId =
        typeof auth === 'object' && auth !== null && 'deviceId' in auth ? auth.deviceId : undefined;

      if (typeof token !== 'string' || typeof deviceId !== 'string') {
        next(new Error('Authentication required: provide auth.token and auth.deviceId'));
        return;
      }

      const claims = await AuthService.authenticateToken(token);
      if (!claims) {
        next(new Error('Invalid or expired session'));
        return;
      }

      const device = await Device.findByUserIdAndDeviceId(claims.userId, deviceId);
      if (!device || !device.publicKeys()) {
        next(new Error('Unknown device'));
        return;
      }

      socket.data.userId = claims.userId;
      socket.data.deviceId = device.id;
      next();
    } catch (error) {
      console.error('[Socket] Handshake failed:', error);
      next(new Error('Internal server error'));
    }
  });

  io.on('connection', (socket) => {
    const { userId, deviceId } = socket.data;
    const connection = manager.attach(
      userId,
      deviceId,
      socketTransport(socket, config.realtime.ackTimeoutMs)
    );
    console.log(`[Socket] Device ${deviceId} of user ${userId} connected (socket ${socket.id})`);

    Device.updateLastSeen(deviceId).catch((error: unknown) => {
      console.error('[Socket] Failed to update device last_seen_at:', error);
    });

    socket.onAny((eventName: unknown) => {
      if (eventName !== 'replay') {
        console.warn(`[Socket] Unexpected event from device ${deviceId}, closing`);
        connection.close('protocol_error');
      }
    });

    socket.on('replay', (payload) => {
      const request = parseReplayRequest(payload);
      if (!request) {
        console.warn(`[Socket] Malformed replay request from device ${deviceId}, closing`);
        connection.close('protocol_error');
        return;
      }
      connection.replay(request.replay);
    });

    socket.on('disconnect', () => {
      connection.close('client_disconnect');
    });
  });

  return io;
}
