import { Response } from 'express';
import { ChannelService } from '../services/ChannelService';
import { RelayService } from '../services/RelayService';
import { AuthenticatedRequest, currentUser } from '../middleware/auth';
import { requireUuid } from '../utils/ids';
import { sendError, sendSuccess } from '../utils/http';

/**
 * POST /api/channel
 *
 * @body {string[]} participants - Usernames to add; the caller is always a member.
 *
 * @returns {ChannelInfo} The new channel with its fan-out device set.
 *
 * @error 400 - Fewer than two distinct participants.
 * @error 404 - Unknown username.
 */
export async function createChannel(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const channel = await ChannelService.createChannel(userId, req.body?.participants);
    sendSuccess(res, channel, 201);
  } catch (error) {
    sendError(res, error, 'creating channel');
  }
}

export async function getChannel(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const channel = await ChannelService.getChannel(
      userId,
      requireUuid(req.params.channelId, 'channelId')
    );
    sendSuccess(res, channel);
  } catch (error) {
    sendError(res, error, 'fetching channel');
  }
}

/**
 * POST /api/channel/:channelId/msg
 *
 * @body {string} message_id - Sender-generated UUIDv7.
 * @body {string} device_id  - Sending device, owned by the caller.
 * @body {Array<{ recipient_device_id: string; ciphertext: string; is_pre_key: boolean }>} payloads
 *
 * @returns {SendAck}
 *
 * @error 409 - A message with this id already exists.
 */
export async function sendMessage(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const ack = await RelayService.send(
      userId,
      requireUuid(req.params.channelId, 'channelId'),
      req.body ?? {}
    );
    sendSuccess(res, ack, 201);
  } catch (error) {
    sendError(res, error, 'sending message');
  }
}

/** GET /api/channel/:channelId/history?device=&after=&limit= */
export async function getHistory(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const { device, after, limit } = req.query;
    const messages = await RelayService.history(
      userId,
      requireUuid(req.params.channelId, 'channelId'),
      device,
      after,
      limit
    );
    sendSuccess(res, messages);
  } catch (error) {
    sendError(res, error, 'fetching history');
  }
}
