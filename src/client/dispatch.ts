import { ServerEvent, assertNever } from '../realtime/events';

type DataOf<T extends ServerEvent['type']> = Extract<ServerEvent, { type: T }>['data'];

export interface EventHandlers<R = void> {
  channel_created(data: DataOf<'channel_created'>): R;
  message(data: DataOf<'message'>): R;
  device_added(data: DataOf<'device_added'>): R;
  ping(data: DataOf<'ping'>): R;
}

/** Route an event to its handler; every event type must be handled. */
export function dispatchEvent<R>(event: ServerEvent, handlers: EventHandlers<R>): R {
  switch (event.type) {
    case 'channel_created':
      return handlers.channel_created(event.data);
    case 'message':
      return handlers.message(event.data);
    case 'device_added':
      return handlers.device_added(event.data);
    case 'ping':
      return handlers.ping(event.data);
    default:
      return assertNever(event);
  }
}
