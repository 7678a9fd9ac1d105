import { Model, RelationMappingsThunk } from 'objection';
import { BaseModel } from './BaseModel';
import { User } from './User';

export class AuthChallenge extends BaseModel {
  static tableName = 'auth_challenges';

  declare id: string;
  user_id!: string;
  nonce!: string;
  expires_at!: Date;
  declare created_at: Date;

  // Relations
  user?: User;

  static relationMappings: RelationMappingsThunk = () => ({
    user: {
      relation: Model.BelongsToOneRelation,
      modelClass: User,
      join: {
        from: 'auth_challenges.user_id',
        to: 'users.id',
      },
    },
  });

  protected get dateColumns(): readonly string[] {
    return ['created_at', 'expires_at'];
  }

  get isExpired(): boolean {
    return new Date() > new Date(this.expires_at);
  }

  static async createForUser(userId: string, nonce: string, expiresInMs: number): Promise<AuthChallenge> {
    return this.query().insertAndFetch({
      user_id: userId,
      nonce,
      expires_at: new Date(Date.now() + expiresInMs),
    });
  }

  /**
   * Remove the challenge and return it, or `undefined` if it was already
   * consumed. Of several concurrent callers only one gets the row back.
   */
  static async consume(challengeId: string): Promise<AuthChallenge | undefined> {
    const challenge = await this.query().findById(challengeId);
    if (!challenge) return undefined;

    const deleted = await this.query().deleteById(challengeId);
    return deleted === 1 ? challenge : undefined;
  }

  static async cleanupExpired(): Promise<number> {
    return this.query().where('expires_at', '<', new Date()).delete();
  }
}
