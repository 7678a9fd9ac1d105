import { config } from '../config';
import { Device, KeyDigest, OneTimeKey } from '../models';
import { CapacityError, NotFoundError, ValidationError } from '../errors';
import { concatKeys, decodeKey, decodeSignature, verifySignature } from '../utils/crypto';
import { withTransaction } from '../utils/transaction';
import { IdentityService } from './IdentityService';
import { ClaimedPreKey, InboundPreKeys, PreKeyPoolStatus, PreKeyUploadResult } from '../types';

/** Decode a list of base64 keys, rejecting duplicates within the list. */
function decodeKeyList(value: unknown, field: string, allowEmpty: boolean): Buffer[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array of base64 keys`);
  }
  if (!allowEmpty && value.length === 0) {
    throw new ValidationError(`${field} must contain at least one key`);
  }
  if (value.length > config.preKeys.maxBatch) {
    throw new ValidationError(`${field} may contain at most ${config.preKeys.maxBatch} keys`);
  }

  const seen = new Set<string>();
  return value.map((entry: unknown, index) => {
    const key = decodeKey(entry, `${field}[${index}]`);
    const hex = key.toString('hex');
    if (seen.has(hex)) {
      throw new ValidationError(`${field} contains the same key twice`, 'invalid_key');
    }
    seen.add(hex);
    return key;
  });
}

function verifyBatch(verifyKey: Buffer, keys: Buffer[], signature: unknown, field: string): void {
  const decoded = decodeSignature(signature, field);
  if (!verifySignature(verifyKey, concatKeys(keys), decoded)) {
    throw new ValidationError(`${field} does not match the key batch`, 'invalid_signature');
  }
}

export class PreKeyService {
  /**
   * Add a signed batch of one-time keys to a device's pool and optionally
   * remove keys the device has discarded. Keys the device published before,
   * including claimed and removed ones, are skipped.
   */
  static async uploadKeys(
    userId: string,
    deviceId: string,
    body: Partial<InboundPreKeys>
  ): Promise<PreKeyUploadResult> {
    const device = await IdentityService.getOwnedDevice(userId, deviceId);
    const verifyKey = device.verify_key;
    if (!verifyKey) {
      throw new ValidationError('Device has no identity keys yet', 'invalid_key');
    }

    const keys = decodeKeyList(body.keys, 'keys', false);
    verifyBatch(verifyKey, keys, body.signature, 'signature');

    let removedKeys: Buffer[] = [];
    if (body.removed !== undefined) {
      removedKeys = decodeKeyList(body.removed, 'removed', true);
      if (removedKeys.length > 0) {
        verifyBatch(verifyKey, removedKeys, body.removed_signature, 'removed_signature');
      }
    }

    const result = await withTransaction('upload one-time keys', async (trx) => {
      const removed = await OneTimeKey.deleteKeys(deviceId, removedKeys, trx);
      const fresh = await KeyDigest.recordNew(deviceId, keys, trx);
      const accepted = await OneTimeKey.insertIgnoringDuplicates(deviceId, fresh, trx);
      const poolSize = await OneTimeKey.countByDeviceId(deviceId, trx);
      return { accepted, removed, pool_size: poolSize };
    });

    console.log(
      `[PreKeyService] Device ${deviceId}: +${result.accepted} -${result.removed} keys, pool ${result.pool_size}`
    );
    return result;
  }

  static async poolStatus(userId: string, deviceId: string): Promise<PreKeyPoolStatus> {
    await IdentityService.getOwnedDevice(userId, deviceId);
    const count = await OneTimeKey.countByDeviceId(deviceId);
    return {
      device_id: deviceId,
      count,
      low_water_mark: config.preKeys.lowWaterMark,
      target_size: config.preKeys.targetSize,
      needs_more: count < config.preKeys.lowWaterMark,
    };
  }

  /**
   * Hand out one key from the device's pool and remove it. A key is returned
   * to at most one caller. A lost race means another claimer removed that
   * key, so the loop moves on until it wins one or the pool is empty.
   *
   * @param ownerId - When given, the device must belong to this user.
   * @throws CapacityError when the pool is empty.
   */
  static async claimKey(deviceId: string, ownerId?: string): Promise<ClaimedPreKey> {
    const device = await Device.query().findById(deviceId);
    if (!device || !device.publicKeys() || (ownerId !== undefined && device.user_id !== ownerId)) {
      throw new NotFoundError('device_not_found', 'Device not found');
    }

    const lost: string[] = [];
    while (true) {
      const outcome = await withTransaction('claim one-time key', (trx) =>
        OneTimeKey.claimOne(deviceId, trx, lost)
      );

      switch (outcome.status) {
        case 'claimed':
          return outcome.key.toClaimed();
        case 'empty':
          throw new CapacityError();
        case 'lost_race':
          lost.push(outcome.keyId);
          break;
      }
    }
  }
}
