import { Model, QueryContext, RelationMappingsThunk, Transaction } from 'objection';
import { encodeBase64 } from 'tweetnacl-util';
import { BaseModel } from './BaseModel';
import { User } from './User';
import { DevicePublicKeys, DeviceSummary } from '../types';

export class Device extends BaseModel {
  static tableName = 'devices';

  declare id: string;
  user_id!: string;
  verify_key!: Buffer | null;
  agreement_key!: Buffer | null;
  last_seen_at!: Date;
  declare created_at: Date;

  // Relations
  user?: User;

  static relationMappings: RelationMappingsThunk = () => ({
    user: {
      relation: Model.BelongsToOneRelation,
      modelClass: User,
      join: {
        from: 'devices.user_id',
        to: 'users.id',
      },
    },
  });

  protected get dateColumns(): readonly string[] {
    return ['created_at', 'last_seen_at'];
  }

  $beforeInsert(queryContext: QueryContext) {
    super.$beforeInsert(queryContext);
    if (!this.last_seen_at) {
      this.last_seen_at = this.created_at;
    }
  }

  /** Public identity material, or `null` while the device is still pending. */
  publicKeys(): DevicePublicKeys | null {
    if (!this.verify_key || !this.agreement_key) return null;
    return {
      device_id: this.id,
      user_id: this.user_id,
      verify_key: encodeBase64(this.verify_key),
      agreement_key: encodeBase64(this.agreement_key),
    };
  }

  toSummary(): DeviceSummary {
    return {
      device_id: this.id,
      user_id: this.user_id,
      has_keys: this.verify_key !== null && this.agreement_key !== null,
      created_at: this.created_at,
      last_seen_at: this.last_seen_at,
    };
  }

  // Static query methods
  static async findByUserId(userId: string): Promise<Device[]> {
    return this.query().where({ user_id: userId }).orderBy('id', 'asc');
  }

  static async findByUserIdAndDeviceId(
    userId: string,
    deviceId: string
  ): Promise<Device | undefined> {
    return this.query().findOne({ user_id: userId, id: deviceId });
  }

  /** Devices with identity keys set, belonging to any of the given users. */
  static async findKeyedByUserIds(userIds: string[], trx?: Transaction): Promise<Device[]> {
    if (userIds.length === 0) return [];
    return this.query(trx)
      .whereIn('user_id', userIds)
      .whereNotNull('verify_key')
      .whereNotNull('agreement_key')
      .orderBy('id', 'asc');
  }

  static async createForUser(
    userId: string,
    keys: { verify_key: Buffer; agreement_key: Buffer } | null,
    trx?: Transaction
  ): Promise<Device> {
    return this.query(trx).insertAndFetch({
      user_id: userId,
      verify_key: keys ? keys.verify_key : null,
      agreement_key: keys ? keys.agreement_key : null,
    });
  }

  /**
   * Set identity keys on a pending device. The update only matches while
   * both keys are NULL, so a second attempt affects no rows.
   */
  static async setKeysOnce(
    deviceId: string,
    keys: { verify_key: Buffer; agreement_key: Buffer },
    trx?: Transaction
  ): Promise<boolean> {
    const updated = await this.query(trx)
      .patch({ verify_key: keys.verify_key, agreement_key: keys.agreement_key })
      .where({ id: deviceId })
      .whereNull('verify_key')
      .whereNull('agreement_key');
    return updated === 1;
  }

  static async deleteByUserIdAndDeviceId(userId: string, deviceId: string): Promise<number> {
    return this.query().where({ user_id: userId, id: deviceId }).delete();
  }

  static async updateLastSeen(id: string): Promise<number> {
    return this.query().patch({ last_seen_at: new Date() }).where({ id });
  }
}
