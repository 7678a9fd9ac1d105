import { Channel, Device, User } from '../models';
import { NotFoundError, ValidationError } from '../errors';
import { withTransaction } from '../utils/transaction';
import { connectionManager } from '../realtime/ConnectionManager';
import { ChannelInfo, ChannelSummary, DevicePublicKeys } from '../types';

const MAX_PARTICIPANTS = 64;

function toInfo(channel: Channel, devices: Device[]): ChannelInfo {
  const keys: DevicePublicKeys[] = [];
  for (const device of devices) {
    const publicKeys = device.publicKeys();
    if (publicKeys) keys.push(publicKeys);
  }
  return {
    channel_id: channel.id,
    created_at: channel.created_at,
    participants: (channel.participants ?? []).map((user) => user.toInfo()),
    devices: keys,
  };
}

export class ChannelService {
  /**
   * Create a channel between the creator and the named users. Always creates
   * a new channel, even if one with the same members exists.
   */
  static async createChannel(creatorId: string, participantUsernames: unknown): Promise<ChannelInfo> {
    if (
      !Array.isArray(participantUsernames) ||
      !participantUsernames.every((name): name is string => typeof name === 'string')
    ) {
      throw new ValidationError('participants must be an array of usernames', 'invalid_participants');
    }

    const usernames = [...new Set(participantUsernames.map((name) => name.trim()))];
    if (usernames.length > MAX_PARTICIPANTS) {
      throw new ValidationError(
        `A channel may have at most ${MAX_PARTICIPANTS} participants`,
        'invalid_participants'
      );
    }

    const users = await User.findByUsernames(usernames);
    if (users.length !== usernames.length) {
      const found = new Set(users.map((user) => user.username));
      const missing = usernames.filter((name) => !found.has(name));
      throw new NotFoundError('user_not_found', `Unknown user: ${missing.join(', ')}`);
    }

    const participantIds = [...new Set([creatorId, ...users.map((user) => user.id)])];
    if (participantIds.length < 2) {
      throw new ValidationError(
        'A channel needs at least two distinct participants',
        'invalid_participants'
      );
    }

    const channelId = await withTransaction('create channel', async (trx) => {
      const channel = await Channel.createWithParticipants(creatorId, participantIds, trx);
      return channel.id;
    });

    const info = await this.loadInfo(channelId);
    const notified = connectionManager.notifyUsers(participantIds, {
      type: 'channel_created',
      data: info,
    });
    console.log(
      `[ChannelService] Channel ${channelId} created with ${participantIds.length} participants, ${notified} devices notified`
    );
    return info;
  }

  /** Channel metadata and fan-out set. Non-participants get a not-found. */
  static async getChannel(userId: string, channelId: string): Promise<ChannelInfo> {
    await this.assertParticipant(channelId, userId);
    return this.loadInfo(channelId);
  }

  static async listChannels(userId: string): Promise<ChannelSummary[]> {
    const channels = await Channel.findForUser(userId);
    return channels.map((channel) => ({
      channel_id: channel.id,
      created_at: channel.created_at,
      participants: (channel.participants ?? []).map((user) => user.toInfo()),
    }));
  }

  static async assertParticipant(channelId: string, userId: string): Promise<void> {
    if (!(await Channel.isParticipant(channelId, userId))) {
      throw new NotFoundError('channel_not_found', 'Channel not found');
    }
  }

  private static async loadInfo(channelId: string): Promise<ChannelInfo> {
    const channel = await Channel.findWithParticipants(channelId);
    if (!channel) throw new NotFoundError('channel_not_found', 'Channel not found');
    const devices = await Device.findKeyedByUserIds(
      (channel.participants ?? []).map((user) => user.id)
    );
    return toInfo(channel, devices);
  }
}
