import { Request, Response } from 'express';
import { IdentityService } from '../services/IdentityService';
import { PreKeyService } from '../services/PreKeyService';
import { requireUuid } from '../utils/ids';
import { sendError, sendSuccess } from '../utils/http';

/**
 * POST /api/users/register
 *
 * Creates a user and its first device in one step.
 *
 * @body {string} username      - 3-32 characters of `[A-Za-z0-9_.-]`.
 * @body {string} verify_key    - Base64 Ed25519 public key (32 bytes).
 * @body {string} agreement_key - Base64 X25519 public key (32 bytes).
 * @body {string} signature     - Base64 signature of the agreement key bytes by verify_key.
 *
 * @returns {{ user: UserInfo; device: DevicePublicKeys }}
 *
 * @error 400 - Bad key length or binding signature.
 * @error 409 - Username already exists.
 */
export async function registerUser(req: Request, res: Response): Promise<void> {
  try {
    const { username, verify_key, agreement_key, signature } = req.body ?? {};
    const result = await IdentityService.registerUser(username, {
      verify_key,
      agreement_key,
      signature,
    });
    sendSuccess(res, result, 201, 'User registered successfully');
  } catch (error) {
    sendError(res, error, 'registering user');
  }
}

/** GET /api/users/:userId */
export async function getUser(req: Request, res: Response): Promise<void> {
  try {
    const user = await IdentityService.getUser(requireUuid(req.params.userId, 'userId'));
    sendSuccess(res, user);
  } catch (error) {
    sendError(res, error, 'fetching user');
  }
}

/** GET /api/users/:userId/devices: public keys of every keyed device. */
export async function listUserDevices(req: Request, res: Response): Promise<void> {
  try {
    const devices = await IdentityService.listPublicKeys(requireUuid(req.params.userId, 'userId'));
    sendSuccess(res, devices);
  } catch (error) {
    sendError(res, error, 'listing user devices');
  }
}

/** GET /api/users/:userId/devices/:deviceId */
export async function getDeviceKeys(req: Request, res: Response): Promise<void> {
  try {
    const keys = await IdentityService.getPublicKeys(
      requireUuid(req.params.deviceId, 'deviceId'),
      requireUuid(req.params.userId, 'userId')
    );
    sendSuccess(res, keys);
  } catch (error) {
    sendError(res, error, 'fetching device keys');
  }
}

/**
 * POST /api/users/:userId/devices/:deviceId/otk
 *
 * Claims one one-time pre-key from the device's pool. The key is removed and
 * never handed out again.
 *
 * @returns {{ id: string; device_id: string; public_key: string }}
 *
 * @error 404 - Unknown device.
 * @error 409 - Pool empty (`no_keys_available`).
 */
export async function claimOneTimeKey(req: Request, res: Response): Promise<void> {
  try {
    const key = await PreKeyService.claimKey(
      requireUuid(req.params.deviceId, 'deviceId'),
      requireUuid(req.params.userId, 'userId')
    );
    sendSuccess(res, key);
  } catch (error) {
    sendError(res, error, 'claiming one-time key');
  }
}
