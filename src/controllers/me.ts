import { Response } from 'express';
import { IdentityService } from '../services/IdentityService';
import { PreKeyService } from '../services/PreKeyService';
import { ChannelService } from '../services/ChannelService';
import { AuthenticatedRequest, currentUser } from '../middleware/auth';
import { requireUuid } from '../utils/ids';
import { sendError, sendSuccess } from '../utils/http';

export async function getMe(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    sendSuccess(res, await IdentityService.getUser(userId));
  } catch (error) {
    sendError(res, error, 'fetching current user');
  }
}

/** DELETE /api/me: removes the account with its devices, keys, sessions and messages. */
export async function deleteMe(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    await IdentityService.deleteUser(userId);
    res.json({ success: true, message: 'Account deleted' });
  } catch (error) {
    sendError(res, error, 'deleting account');
  }
}

export async function listMyDevices(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    sendSuccess(res, await IdentityService.listDevices(userId));
  } catch (error) {
    sendError(res, error, 'listing devices');
  }
}

/**
 * POST /api/me/device
 *
 * With `verify_key`, `agreement_key` and `signature` in the body, enrols a
 * keyed device. With an empty body, reserves a pending device whose keys are
 * set later through PUT /api/me/device/:deviceId.
 */
export async function addDevice(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const { verify_key, agreement_key, signature } = req.body ?? {};

    if (verify_key === undefined && agreement_key === undefined && signature === undefined) {
      sendSuccess(res, await IdentityService.createPendingDevice(userId), 201);
      return;
    }

    const device = await IdentityService.addDevice(userId, { verify_key, agreement_key, signature });
    sendSuccess(res, device, 201);
  } catch (error) {
    sendError(res, error, 'adding device');
  }
}

/**
 * PUT /api/me/device/:deviceId
 *
 * Sets the identity keys of a pending device. Keys cannot change once set.
 *
 * @error 409 - Keys already set.
 */
export async function setDeviceKeys(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const { verify_key, agreement_key, signature } = req.body ?? {};
    const device = await IdentityService.setDeviceKeys(
      userId,
      requireUuid(req.params.deviceId, 'deviceId'),
      { verify_key, agreement_key, signature }
    );
    sendSuccess(res, device);
  } catch (error) {
    sendError(res, error, 'setting device keys');
  }
}

export async function removeDevice(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    await IdentityService.removeDevice(userId, requireUuid(req.params.deviceId, 'deviceId'));
    res.json({ success: true, message: 'Device removed' });
  } catch (error) {
    sendError(res, error, 'removing device');
  }
}

export async function getPreKeyStatus(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const status = await PreKeyService.poolStatus(
      userId,
      requireUuid(req.params.deviceId, 'deviceId')
    );
    sendSuccess(res, status);
  } catch (error) {
    sendError(res, error, 'fetching pre-key status');
  }
}

/**
 * POST /api/me/device/:deviceId/otks
 *
 * @body {string[]} keys                - Base64 X25519 public keys.
 * @body {string}   signature           - Device signature over the concatenated key bytes.
 * @body {string[]} [removed]           - Keys to drop from the pool.
 * @body {string}   [removed_signature] - Device signature over the concatenated removed keys.
 *
 * @returns {{ accepted: number; removed: number; pool_size: number }}
 */
export async function uploadPreKeys(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    const result = await PreKeyService.uploadKeys(
      userId,
      requireUuid(req.params.deviceId, 'deviceId'),
      req.body ?? {}
    );
    sendSuccess(res, result);
  } catch (error) {
    sendError(res, error, 'uploading pre-keys');
  }
}

export async function listMyChannels(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { userId } = currentUser(req);
    sendSuccess(res, await ChannelService.listChannels(userId));
  } catch (error) {
    sendError(res, error, 'listing channels');
  }
}
