import { config } from '../config';
import { Channel, Device, Message, MessagePayload } from '../models';
import { ConflictError, ForbiddenError, ValidationError } from '../errors';
import { decodeCiphertext } from '../utils/crypto';
import { requireUuid, requireUuidV7 } from '../utils/ids';
import { isUniqueViolation, withTransaction } from '../utils/transaction';
import { connectionManager } from '../realtime/ConnectionManager';
import { ChannelService } from './ChannelService';
import { IdentityService } from './IdentityService';
import { InboundChatMessage, OutboundChatMessage, SendAck } from '../types';

interface PreparedPayload {
  recipient_device_id: string;
  ciphertext: Buffer;
  is_pre_key: boolean;
}

function preparePayloads(value: unknown, allowedDevices: Set<string>): PreparedPayload[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError('payloads must be a non-empty array');
  }

  const seen = new Set<string>();
  return value.map((entry: unknown, index): PreparedPayload => {
    if (typeof entry !== 'object' || entry === null) {
      throw new ValidationError(`payloads[${index}] must be an object`);
    }
    const recipientId = 'recipient_device_id' in entry ? entry.recipient_device_id : undefined;
    const ciphertext = 'ciphertext' in entry ? entry.ciphertext : undefined;
    const isPreKey = 'is_pre_key' in entry ? entry.is_pre_key : undefined;

    const recipient = requireUuid(recipientId, `payloads[${index}].recipient_device_id`);
    if (seen.has(recipient)) {
      throw new ValidationError(`Device ${recipient} appears twice in payloads`);
    }
    seen.add(recipient);
    if (!allowedDevices.has(recipient)) {
      throw new ValidationError(`Device ${recipient} is not a device of a channel participant`);
    }

    if (
      typeof ciphertext !== 'string' ||
      ciphertext.length === 0 ||
      ciphertext.length > config.messages.maxCiphertextLength
    ) {
      throw new ValidationError(
        `payloads[${index}].ciphertext must be 1-${config.messages.maxCiphertextLength} base64 characters`
      );
    }
    const bytes = decodeCiphertext(ciphertext);
    if (!bytes || bytes.length === 0) {
      throw new ValidationError(`payloads[${index}].ciphertext is not valid base64`);
    }

    if (isPreKey !== undefined && typeof isPreKey !== 'boolean') {
      throw new ValidationError(`payloads[${index}].is_pre_key must be a boolean`);
    }

    return { recipient_device_id: recipient, ciphertext: bytes, is_pre_key: isPreKey === true };
  });
}

export class RelayService {
  /**
   * Persist a message and its per-device ciphertexts in one transaction, then
   * push each payload to its recipient if online. The sender's payload list
   * decides the fan-out; the server only checks each target is eligible.
   */
  static async send(
    userId: string,
    channelId: string,
    body: Partial<InboundChatMessage>
  ): Promise<SendAck> {
    const messageId = requireUuidV7(body.message_id, 'message_id');
    const senderDeviceId = requireUuid(body.device_id, 'device_id');

    const sender = await IdentityService.getOwnedDevice(userId, senderDeviceId);
    if (!sender.publicKeys()) {
      throw new ForbiddenError('Device has no identity keys yet');
    }
    await ChannelService.assertParticipant(channelId, userId);

    const participants = await Channel.relatedQuery('participants').for(channelId).select('users.id');
    const eligible = await Device.findKeyedByUserIds(participants.map((user) => user.id));
    const payloads = preparePayloads(body.payloads, new Set(eligible.map((device) => device.id)));

    let message: Message;
    try {
      message = await withTransaction('store message', async (trx) => {
        const stored = await Message.create(
          {
            id: messageId,
            channel_id: channelId,
            sender_id: userId,
            sender_device_id: senderDeviceId,
          },
          trx
        );
        await MessagePayload.insertMany(
          payloads.map((payload) => ({ message_id: messageId, ...payload })),
          trx
        );
        return stored;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('message_exists', `Message ${messageId} already exists`);
      }
      throw error;
    }

    let delivered = 0;
    for (const payload of payloads) {
      const outbound: OutboundChatMessage = {
        message_id: message.id,
        channel_id: channelId,
        author_id: userId,
        device_id: senderDeviceId,
        ciphertext: payload.ciphertext.toString('base64'),
        is_pre_key: payload.is_pre_key,
        timestamp: message.created_at,
      };
      const pushed = connectionManager.sendToDevice(payload.recipient_device_id, {
        type: 'message',
        data: outbound,
      });
      if (pushed) {
        delivered++;
      }
    }

    return {
      message_id: message.id,
      channel_id: channelId,
      created_at: message.created_at,
      recipients: payloads.length,
      delivered,
    };
  }

  /**
   * Payloads addressed to one of the caller's devices, ascending by message id
   * and strictly after `after` when given.
   */
  static async history(
    userId: string,
    channelId: string,
    deviceId: unknown,
    after?: unknown,
    limit?: unknown
  ): Promise<OutboundChatMessage[]> {
    const device = requireUuid(deviceId, 'device');
    const afterId = after === undefined || after === '' ? undefined : requireUuid(after, 'after');
    const pageSize = parseLimit(limit);

    await IdentityService.getOwnedDevice(userId, device);
    await ChannelService.assertParticipant(channelId, userId);

    return MessagePayload.findHistory(channelId, device, afterId, pageSize);
  }
}

function parseLimit(value: unknown): number {
  if (value === undefined || value === '') return config.messages.historyDefaultLimit;
  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(parsed, config.messages.historyMaxLimit);
}
