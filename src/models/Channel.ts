import { Model, RelationMappingsThunk, Transaction } from 'objection';
import { BaseModel } from './BaseModel';
import { User } from './User';

export class Channel extends BaseModel {
  static tableName = 'channels';

  declare id: string;
  created_by!: string | null;
  declare created_at: Date;

  // Relations
  participants?: User[];

  static relationMappings: RelationMappingsThunk = () => ({
    participants: {
      relation: Model.ManyToManyRelation,
      modelClass: User,
      join: {
        from: 'channels.id',
        through: {
          from: 'channel_participants.channel_id',
          to: 'channel_participants.user_id',
        },
        to: 'users.id',
      },
    },
  });

  // Static query methods
  static async createWithParticipants(
    createdBy: string,
    participantIds: string[],
    trx: Transaction
  ): Promise<Channel> {
    const channel = await this.query(trx).insertAndFetch({ created_by: createdBy });
    await trx
      .table('channel_participants')
      .insert(participantIds.map((userId) => ({ channel_id: channel.id, user_id: userId })));
    return channel;
  }

  static async findWithParticipants(channelId: string): Promise<Channel | undefined> {
    return this.query()
      .findById(channelId)
      .withGraphFetched('participants(byUsername)')
      .modifiers({
        byUsername(builder) {
          builder.orderBy('username', 'asc');
        },
      });
  }

  /** Channels the user participates in, newest first. */
  static async findForUser(userId: string): Promise<Channel[]> {
    return User.relatedQuery('channels')
      .for(userId)
      .withGraphFetched('participants(byUsername)')
      .modifiers({
        byUsername(builder) {
          builder.orderBy('username', 'asc');
        },
      })
      .orderBy('channels.id', 'desc');
  }

  static async isParticipant(channelId: string, userId: string): Promise<boolean> {
    const row = await this.knex()
      .table('channel_participants')
      .where({ channel_id: channelId, user_id: userId })
      .first('user_id');
    return row !== undefined;
  }

  /** Ids of every user sharing at least one channel with `userId`, including itself. */
  static async findPeerUserIds(userId: string): Promise<string[]> {
    const rows: Array<{ user_id: string }> = await this.knex()
      .table('channel_participants')
      .distinct('user_id')
      .whereIn(
        'channel_id',
        this.knex().table('channel_participants').select('channel_id').where({ user_id: userId })
      );
    const ids = new Set(rows.map((row) => row.user_id));
    ids.add(userId);
    return [...ids];
  }
}
