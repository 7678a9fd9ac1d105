import { randomInt } from 'crypto';
import { Model, RelationMappingsThunk, Transaction } from 'objection';
import { encodeBase64 } from 'tweetnacl-util';
import { v7 as uuidv7 } from 'uuid';
import { BaseModel } from './BaseModel';
import { Device } from './Device';
import { ClaimedPreKey } from '../types';

/** Claims pick at random among this many of the oldest keys to spread contention. */
const CLAIM_WINDOW = 8;

export type ClaimOutcome =
  | { status: 'claimed'; key: OneTimeKey }
  | { status: 'empty' }
  | { status: 'lost_race'; keyId: string };

export class OneTimeKey extends BaseModel {
  static tableName = 'one_time_keys';

  declare id: string;
  device_id!: string;
  public_key!: Buffer;
  declare created_at: Date;

  // Relations
  device?: Device;

  static relationMappings: RelationMappingsThunk = () => ({
    device: {
      relation: Model.BelongsToOneRelation,
      modelClass: Device,
      join: {
        from: 'one_time_keys.device_id',
        to: 'devices.id',
      },
    },
  });

  toClaimed(): ClaimedPreKey {
    return {
      id: this.id,
      device_id: this.device_id,
      public_key: encodeBase64(this.public_key),
    };
  }

  // Static query methods
  static async countByDeviceId(deviceId: string, trx?: Transaction): Promise<number> {
    return this.query(trx).where({ device_id: deviceId }).resultSize();
  }

  /**
   * Insert a batch of keys, skipping any already present in the device's
   * pool. Returns how many rows were inserted.
   */
  static async insertIgnoringDuplicates(
    deviceId: string,
    keys: Buffer[],
    trx: Transaction
  ): Promise<number> {
    if (keys.length === 0) return 0;

    const now = new Date();
    const rows = keys.map((publicKey) => ({
      id: uuidv7(),
      device_id: deviceId,
      public_key: publicKey,
      created_at: now,
    }));

    const inserted: { id: string }[] = await trx
      .table(this.tableName)
      .insert(rows)
      .onConflict(['device_id', 'public_key'])
      .ignore()
      .returning('id');

    return inserted.length;
  }

  static async deleteKeys(deviceId: string, keys: Buffer[], trx: Transaction): Promise<number> {
    if (keys.length === 0) return 0;
    return this.query(trx).where({ device_id: deviceId }).whereIn('public_key', keys).delete();
  }

  /**
   * One claim attempt. The candidate is removed with a delete keyed on its
   * id; only the attempt whose delete removed the row may hand it out.
   */
  static async claimOne(
    deviceId: string,
    trx: Transaction,
    excludeIds: readonly string[] = []
  ): Promise<ClaimOutcome> {
    const candidates = await this.query(trx)
      .where({ device_id: deviceId })
      .whereNotIn('id', excludeIds)
      .orderBy('id', 'asc')
      .limit(CLAIM_WINDOW);

    if (candidates.length === 0) return { status: 'empty' };

    const candidate = candidates[randomInt(candidates.length)];
    const deleted = await this.query(trx).deleteById(candidate.id);

    if (deleted !== 1) return { status: 'lost_race', keyId: candidate.id };
    return { status: 'claimed', key: candidate };
  }
}
