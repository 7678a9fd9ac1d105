import { BaseModel } from './BaseModel';

/** Server-side record backing a session token; deleting it revokes the token. */
export class Session extends BaseModel {
  static tableName = 'sessions';

  declare id: string;
  user_id!: string;
  expires_at!: Date;
  declare created_at: Date;

  protected get dateColumns(): readonly string[] {
    return ['created_at', 'expires_at'];
  }

  static async createForUser(userId: string, expiresAt: Date): Promise<Session> {
    return this.query().insertAndFetch({ user_id: userId, expires_at: expiresAt });
  }

  static async findActive(sessionId: string, userId: string): Promise<Session | undefined> {
    return this.query()
      .findOne({ id: sessionId, user_id: userId })
      .where('expires_at', '>', new Date());
  }

  static async cleanupExpired(): Promise<number> {
    return this.query().where('expires_at', '<', new Date()).delete();
  }
}
