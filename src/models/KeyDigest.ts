import { Model, RelationMappingsThunk, Transaction } from 'objection';
import { v7 as uuidv7 } from 'uuid';
import { BaseModel } from './BaseModel';
import { Device } from './Device';
import { keyDigest } from '../utils/crypto';

/**
 * Digest of every one-time key a device has published. Claimed keys leave
 * the pool but their digest stays, so a replayed upload cannot reissue them.
 */
export class KeyDigest extends BaseModel {
  static tableName = 'key_digests';

  declare id: string;
  device_id!: string;
  digest!: string;
  declare created_at: Date;

  // Relations
  device?: Device;

  static relationMappings: RelationMappingsThunk = () => ({
    device: {
      relation: Model.BelongsToOneRelation,
      modelClass: Device,
      join: {
        from: 'key_digests.device_id',
        to: 'devices.id',
      },
    },
  });

  /** Record digests for a batch and return the keys the device never published before. */
  static async recordNew(deviceId: string, keys: Buffer[], trx: Transaction): Promise<Buffer[]> {
    if (keys.length === 0) return [];

    const now = new Date();
    const rows = keys.map((key) => ({
      id: uuidv7(),
      device_id: deviceId,
      digest: keyDigest(key),
      created_at: now,
    }));

    const inserted: { digest: string }[] = await trx
      .table(this.tableName)
      .insert(rows)
      .onConflict(['device_id', 'digest'])
      .ignore()
      .returning('digest');

    const fresh = new Set(inserted.map((row) => row.digest));
    return keys.filter((key) => fresh.has(keyDigest(key)));
  }
}
