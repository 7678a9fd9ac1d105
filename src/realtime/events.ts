import { ChannelInfo, DevicePublicKeys, OutboundChatMessage } from '../types';

/** Everything the gateway pushes to a device. Closed: add a member here and every switch breaks. */
export type ServerEvent =
  | { type: 'channel_created'; data: ChannelInfo }
  | { type: 'message'; data: OutboundChatMessage }
  | { type: 'device_added'; data: DevicePublicKeys }
  | { type: 'ping'; data: { at: string } };

/** A server event stamped with its connection counter, as sent on the wire. */
export type EventFrame = ServerEvent & { counter: number };

export type ResyncReason = 'beyond_retention' | 'ahead_of_server';

/** Sent instead of a replay the server cannot serve. */
export interface ResyncRequired {
  reason: ResyncReason;
  next_counter: number;
}

export interface ReplayRequest {
  replay: number;
}

export type CloseReason =
  | 'client_disconnect'
  | 'replaced'
  | 'queue_overflow'
  | 'ack_timeout'
  | 'protocol_error'
  | 'device_removed'
  | 'account_deleted'
  | 'server_shutdown';

export function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

/** Short human-readable label for logs. */
export function describeEvent(event: ServerEvent): string {
  switch (event.type) {
    case 'channel_created':
      return `channel_created(${event.data.channel_id})`;
    case 'message':
      return `message(${event.data.message_id})`;
    case 'device_added':
      return `device_added(${event.data.device_id})`;
    case 'ping':
      return 'ping';
    default:
      return assertNever(event);
  }
}

/**
 * Parse a client replay request. Returns `null` for anything other than
 * `{ replay: <integer >= -1> }`.
 */
export function parseReplayRequest(payload: unknown): ReplayRequest | null {
  if (typeof payload !== 'object' || payload === null || !('replay' in payload)) {
    return null;
  }
  const { replay } = payload;
  if (typeof replay !== 'number' || !Number.isSafeInteger(replay) || replay < -1) {
    return null;
  }
  return { replay };
}
