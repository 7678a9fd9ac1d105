import { Transaction } from 'objection';
import { BaseModel } from './BaseModel';

/** Message metadata. Content lives only in `MessagePayload` rows. */
export class Message extends BaseModel {
  static tableName = 'messages';

  declare id: string;
  channel_id!: string;
  sender_id!: string;
  sender_device_id!: string;
  declare created_at: Date;

  static async create(
    data: { id: string; channel_id: string; sender_id: string; sender_device_id: string },
    trx: Transaction
  ): Promise<Message> {
    return this.query(trx).insertAndFetch(data);
  }
}
