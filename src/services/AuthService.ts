import jwt from 'jsonwebtoken';
import { config, durationToMs } from '../config';
import { AuthChallenge, Device, Session, User } from '../models';
import { AuthError } from '../errors';
import { challengeSigningBytes, decodeSignature, generateNonce, verifySignature } from '../utils/crypto';
import { requireUuid } from '../utils/ids';
import { ChallengeResponse, SessionResponse } from '../types';

export interface SessionClaims {
  userId: string;
  sessionId: string;
}

function decodeClaims(token: string): SessionClaims | null {
  try {
    const decoded = jwt.verify(token, config.jwt.secret);
    if (
      typeof decoded !== 'object' ||
      typeof decoded.userId !== 'string' ||
      typeof decoded.sessionId !== 'string'
    ) {
      return null;
    }
    return { userId: decoded.userId, sessionId: decoded.sessionId };
  } catch {
    return null;
  }
}

export class AuthService {
  /**
   * Issue a single-use nonce for `username`. Unknown users get the same
   * error as any other authentication failure.
   */
  static async startChallenge(username: unknown): Promise<ChallengeResponse> {
    if (typeof username !== 'string' || username.trim().length === 0) {
      throw new AuthError('Authentication failed');
    }
    const user = await User.findByUsername(username.trim());
    if (!user) {
      throw new AuthError('Authentication failed');
    }

    const challenge = await AuthChallenge.createForUser(
      user.id,
      generateNonce(),
      config.auth.challengeTtlMs
    );
    return {
      challenge_id: challenge.id,
      nonce: challenge.nonce,
      expires_at: new Date(challenge.expires_at).toISOString(),
    };
  }

  /**
   * Redeem a challenge. The challenge is consumed before the signature is
   * checked, so each challenge admits exactly one attempt.
   */
  static async completeChallenge(
    challengeId: unknown,
    signature: unknown,
    deviceId?: unknown
  ): Promise<SessionResponse> {
    const id = requireUuid(challengeId, 'challenge_id');
    const sig = decodeSignature(signature);
    const requestedDevice =
      deviceId === undefined || deviceId === null ? undefined : requireUuid(deviceId, 'device_id');

    const challenge = await AuthChallenge.consume(id);
    if (!challenge || challenge.isExpired) {
      throw new AuthError('Challenge is unknown, expired or already used', 'expired_challenge');
    }

    const candidates = requestedDevice
      ? [await Device.findByUserIdAndDeviceId(challenge.user_id, requestedDevice)]
      : await Device.findKeyedByUserIds([challenge.user_id]);

    const signed = challengeSigningBytes(challenge.id, challenge.nonce, new Date(challenge.expires_at));
    const verified = candidates.some((device) => {
      const verifyKey = device?.verify_key;
      return verifyKey ? verifySignature(verifyKey, signed, sig) : false;
    });
    if (!verified) {
      console.warn(`[AuthService] Rejected challenge ${challenge.id} for user ${challenge.user_id}`);
      throw new AuthError('Signature does not match any device of this user', 'invalid_signature');
    }

    const user = await User.query().findById(challenge.user_id);
    if (!user) {
      throw new AuthError('Authentication failed');
    }

    const lifetimeMs = durationToMs(config.jwt.expiresIn);
    const session = await Session.createForUser(user.id, new Date(Date.now() + lifetimeMs));
    const claims: SessionClaims = { userId: user.id, sessionId: session.id };
    const token = jwt.sign(claims, config.jwt.secret, {
      expiresIn: Math.floor(lifetimeMs / 1000),
    });

    console.log(`[AuthService] Session ${session.id} opened for user ${user.id}`);
    return { token, expires_at: session.expires_at, user: user.toInfo() };
  }

  /**
   * Resolve a bearer token to its session. Returns `null` for a bad
   * signature, an expired token, or a session that was logged out.
   */
  static async authenticateToken(token: string): Promise<SessionClaims | null> {
    if (token.length === 0) return null;
    const claims = decodeClaims(token);
    if (!claims) return null;

    const session = await Session.findActive(claims.sessionId, claims.userId);
    return session ? claims : null;
  }

  static async logout(sessionId: string): Promise<void> {
    await Session.query().deleteById(sessionId);
  }
}
