import { Model, QueryContext, RelationMappingsThunk } from 'objection';
import { BaseModel } from './BaseModel';
import { Channel } from './Channel';
import { Device } from './Device';
import { UserInfo } from '../types';

export class User extends BaseModel {
  static tableName = 'users';

  declare id: string;
  username!: string;
  declare created_at: Date;
  updated_at!: Date;

  // Relations
  devices?: Device[];
  channels?: Channel[];

  static relationMappings: RelationMappingsThunk = () => ({
    devices: {
      relation: Model.HasManyRelation,
      modelClass: Device,
      join: {
        from: 'users.id',
        to: 'devices.user_id',
      },
    },
    channels: {
      relation: Model.ManyToManyRelation,
      modelClass: Channel,
      join: {
        from: 'users.id',
        through: {
          from: 'channel_participants.user_id',
          to: 'channel_participants.channel_id',
        },
        to: 'channels.id',
      },
    },
  });

  protected get dateColumns(): readonly string[] {
    return ['created_at', 'updated_at'];
  }

  $beforeInsert(queryContext: QueryContext) {
    super.$beforeInsert(queryContext);
    if (!this.updated_at) {
      this.updated_at = this.created_at;
    }
  }

  $beforeUpdate() {
    this.updated_at = new Date();
  }

  toInfo(): UserInfo {
    return { id: this.id, username: this.username, created_at: this.created_at };
  }

  // Static query methods
  static async findByUsername(username: string): Promise<User | undefined> {
    return this.query().findOne({ username });
  }

  static async findByUsernames(usernames: string[]): Promise<User[]> {
    if (usernames.length === 0) return [];
    return this.query().whereIn('username', usernames);
  }
}
