import { Device, User, Channel } from '../models';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../errors';
import { decodeKey, decodeSignature, verifySignature } from '../utils/crypto';
import { isUniqueViolation, withTransaction } from '../utils/transaction';
import { connectionManager } from '../realtime/ConnectionManager';
import { DevicePublicKeys, DeviceSummary, InboundDeviceKeys, UserInfo } from '../types';

const USERNAME_REGEX = /^[A-Za-z0-9_.-]{3,32}$/;

interface VerifiedKeys {
  verify_key: Buffer;
  agreement_key: Buffer;
}

/**
 * Check that `signature` is the verification key's signature over the raw
 * agreement key bytes, binding the two keys to one holder.
 */
export function verifyKeyBinding(keys: Partial<InboundDeviceKeys>): VerifiedKeys {
  const verifyKey = decodeKey(keys.verify_key, 'verify_key');
  const agreementKey = decodeKey(keys.agreement_key, 'agreement_key');
  const signature = decodeSignature(keys.signature);

  if (!verifySignature(verifyKey, agreementKey, signature)) {
    throw new ValidationError(
      'signature is not a valid signature of agreement_key by verify_key',
      'invalid_signature'
    );
  }
  return { verify_key: verifyKey, agreement_key: agreementKey };
}

export function normalizeUsername(value: unknown): string {
  if (typeof value !== 'string' || !USERNAME_REGEX.test(value.trim())) {
    throw new ValidationError(
      'username must be 3-32 characters of letters, digits, "_", "." or "-"'
    );
  }
  return value.trim();
}

export class IdentityService {
  /**
   * Create a user together with its first device. Fails if the key binding
   * does not verify or the username is already registered.
   */
  static async registerUser(
    username: unknown,
    keys: Partial<InboundDeviceKeys>
  ): Promise<{ user: UserInfo; device: DevicePublicKeys }> {
    const name = normalizeUsername(username);
    const verified = verifyKeyBinding(keys);

    try {
      return await withTransaction('register user', async (trx) => {
        const user = await User.query(trx).insertAndFetch({ username: name });
        const device = await Device.createForUser(user.id, verified, trx);
        return { user: user.toInfo(), device: requireKeys(device) };
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        // Either the username or the verify key already exists.
        const existing = await User.findByUsername(name);
        if (existing) throw new ConflictError('username_taken', 'Username already exists');
        throw new ValidationError('verify_key is already registered', 'invalid_key');
      }
      throw error;
    }
  }

  static async getUser(userId: string): Promise<UserInfo> {
    const user = await User.query().findById(userId);
    if (!user) throw new NotFoundError('user_not_found', 'User not found');
    return user.toInfo();
  }

  /** Enrol an additional device with its identity keys in one step. */
  static async addDevice(userId: string, keys: Partial<InboundDeviceKeys>): Promise<DevicePublicKeys> {
    const verified = verifyKeyBinding(keys);
    await this.getUser(userId);

    try {
      const device = await Device.createForUser(userId, verified);
      const publicKeys = requireKeys(device);
      await announceDevice(publicKeys);
      return publicKeys;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('verify_key is already registered', 'invalid_key');
      }
      throw error;
    }
  }

  /** Reserve a device id; keys follow via `setDeviceKeys`. */
  static async createPendingDevice(userId: string): Promise<DeviceSummary> {
    await this.getUser(userId);
    const device = await Device.createForUser(userId, null);
    return device.toSummary();
  }

  static async setDeviceKeys(
    userId: string,
    deviceId: string,
    keys: Partial<InboundDeviceKeys>
  ): Promise<DevicePublicKeys> {
    const verified = verifyKeyBinding(keys);
    const device = await this.getOwnedDevice(userId, deviceId);
    if (device.publicKeys()) {
      throw new ConflictError('keys_already_set', 'Device identity keys are immutable once set');
    }

    let updated: boolean;
    try {
      updated = await Device.setKeysOnce(deviceId, verified);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ValidationError('verify_key is already registered', 'invalid_key');
      }
      throw error;
    }
    if (!updated) {
      throw new ConflictError('keys_already_set', 'Device identity keys are immutable once set');
    }

    const publicKeys: DevicePublicKeys = {
      device_id: device.id,
      user_id: device.user_id,
      verify_key: verified.verify_key.toString('base64'),
      agreement_key: verified.agreement_key.toString('base64'),
    };
    await announceDevice(publicKeys);
    return publicKeys;
  }

  /** Public identity keys of a device. Pending devices are reported as missing. */
  static async getPublicKeys(deviceId: string, userId?: string): Promise<DevicePublicKeys> {
    const device = await Device.query().findById(deviceId);
    const keys = device?.publicKeys();
    if (!keys || (userId !== undefined && keys.user_id !== userId)) {
      throw new NotFoundError('device_not_found', 'Device not found');
    }
    return keys;
  }

  static async listPublicKeys(userId: string): Promise<DevicePublicKeys[]> {
    await this.getUser(userId);
    const devices = await Device.findKeyedByUserIds([userId]);
    return devices.map(requireKeys);
  }

  static async listDevices(userId: string): Promise<DeviceSummary[]> {
    const devices = await Device.findByUserId(userId);
    return devices.map((device) => device.toSummary());
  }

  /**
   * Fetch a device owned by `userId`. A device owned by someone else is
   * reported as forbidden; an unknown id as not found.
   */
  static async getOwnedDevice(userId: string, deviceId: string): Promise<Device> {
    const device = await Device.query().findById(deviceId);
    if (!device) throw new NotFoundError('device_not_found', 'Device not found');
    if (device.user_id !== userId) throw new ForbiddenError('Device belongs to another user');
    return device;
  }

  static async removeDevice(userId: string, deviceId: string): Promise<void> {
    await this.getOwnedDevice(userId, deviceId);
    await Device.deleteByUserIdAndDeviceId(userId, deviceId);
    connectionManager.disconnectDevice(deviceId, 'device_removed');
    console.log(`[IdentityService] Device ${deviceId} removed by user ${userId}`);
  }

  /** Delete a user; devices, keys, sessions and messages cascade. */
  static async deleteUser(userId: string): Promise<void> {
    const deleted = await User.query().deleteById(userId);
    if (deleted === 0) throw new NotFoundError('user_not_found', 'User not found');
    connectionManager.disconnectUser(userId, 'account_deleted');
    console.log(`[IdentityService] User ${userId} deleted`);
  }
}

function requireKeys(device: Device): DevicePublicKeys {
  const keys = device.publicKeys();
  if (!keys) {
    throw new Error(`Device ${device.id} was expected to have identity keys`);
  }
  return keys;
}

/** Tell the owner and everyone sharing a channel with it that a fan-out set grew. */
async function announceDevice(device: DevicePublicKeys): Promise<void> {
  const userIds = await Channel.findPeerUserIds(device.user_id);
  connectionManager.notifyUsers(userIds, { type: 'device_added', data: device });
}
