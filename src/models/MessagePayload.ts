import { Model, Pojo, Transaction } from 'objection';
import { encodeBase64 } from 'tweetnacl-util';
import { normalizeColumns } from './BaseModel';
import { OutboundChatMessage } from '../types';

interface HistoryRow {
  message_id: string;
  channel_id: string;
  sender_id: string;
  sender_device_id: string;
  created_at: Date | number | string;
  ciphertext: Buffer;
  is_pre_key: boolean | number;
}

/** One ciphertext per (message, recipient device) pair of a send's fan-out. */
export class MessagePayload extends Model {
  static tableName = 'message_payloads';
  static idColumn = ['message_id', 'recipient_device_id'];

  message_id!: string;
  recipient_device_id!: string;
  ciphertext!: Buffer;
  is_pre_key!: boolean;

  $parseDatabaseJson(json: Pojo): Pojo {
    return normalizeColumns(super.$parseDatabaseJson(json), [], ['is_pre_key']);
  }

  static async insertMany(
    rows: Array<{
      message_id: string;
      recipient_device_id: string;
      ciphertext: Buffer;
      is_pre_key: boolean;
    }>,
    trx: Transaction
  ): Promise<void> {
    if (rows.length === 0) return;
    await trx.table(this.tableName).insert(rows);
  }

  static async countByMessageId(messageId: string): Promise<number> {
    return this.query().where({ message_id: messageId }).resultSize();
  }

  /**
   * Payloads addressed to `deviceId` in `channelId`, ascending by message id.
   * Message ids are UUIDv7 so id order is creation order.
   */
  static async findHistory(
    channelId: string,
    deviceId: string,
    after: string | undefined,
    limit: number
  ): Promise<OutboundChatMessage[]> {
    const query = this.knex()
      .table('messages')
      .join('message_payloads', 'message_payloads.message_id', 'messages.id')
      .where('messages.channel_id', channelId)
      .andWhere('message_payloads.recipient_device_id', deviceId)
      .select(
        'messages.id as message_id',
        'messages.channel_id',
        'messages.sender_id',
        'messages.sender_device_id',
        'messages.created_at',
        'message_payloads.ciphertext',
        'message_payloads.is_pre_key'
      )
      .orderBy('messages.id', 'asc')
      .limit(limit);

    if (after !== undefined) {
      query.andWhere('messages.id', '>', after);
    }

    const rows: HistoryRow[] = await query;
    return rows.map(toOutbound);
  }
}

export function toOutbound(row: HistoryRow): OutboundChatMessage {
  return {
    message_id: row.message_id,
    channel_id: row.channel_id,
    author_id: row.sender_id,
    device_id: row.sender_device_id,
    ciphertext: encodeBase64(row.ciphertext),
    is_pre_key: Boolean(row.is_pre_key),
    timestamp: row.created_at instanceof Date ? row.created_at : new Date(row.created_at),
  };
}
