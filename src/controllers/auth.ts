import { Request, Response } from 'express';
import { AuthService } from '../services/AuthService';
import { AuthenticatedRequest, currentUser } from '../middleware/auth';
import { sendError, sendSuccess } from '../utils/http';

/**
 * POST /api/auth/challenge
 *
 * Issues a single-use nonce the client signs with one of its devices'
 * Ed25519 verification keys.
 *
 * @body {string} username - The registered username.
 *
 * @returns {{ challenge_id: string; nonce: string; expires_at: string }}
 *
 * @error 401 - Authentication failed (unknown user).
 */
export async function startChallenge(req: Request, res: Response): Promise<void> {
  try {
    const challenge = await AuthService.startChallenge(req.body?.username);
    sendSuccess(res, challenge);
  } catch (error) {
    sendError(res, error, 'generating challenge');
  }
}

/**
 * POST /api/auth/verify
 *
 * Redeems a challenge. The signed message is the UTF-8 encoding of
 * `relay-auth-v1\n<challenge_id>\n<nonce>\n<expires_at>`.
 *
 * @body {string} challenge_id - Id returned by /challenge.
 * @body {string} signature    - Base64 Ed25519 signature (64 bytes).
 * @body {string} [device_id]  - Device whose key signed; any keyed device when omitted.
 *
 * @returns {{ token: string; expires_at: string; user: UserInfo }}
 *
 * @error 400 - Malformed challenge id or signature.
 * @error 401 - Unknown, expired or reused challenge, or a bad signature.
 */
export async function completeChallenge(req: Request, res: Response): Promise<void> {
  try {
    const { challenge_id, signature, device_id } = req.body ?? {};
    const session = await AuthService.completeChallenge(challenge_id, signature, device_id);
    sendSuccess(res, session);
  } catch (error) {
    sendError(res, error, 'verifying challenge');
  }
}

/**
 * POST /api/auth/logout
 *
 * Deletes the session behind the bearer token; the token stops working.
 */
export async function logout(req: AuthenticatedRequest, res: Response): Promise<void> {
  try {
    const { sessionId } = currentUser(req);
    await AuthService.logout(sessionId);
    res.json({ success: true, message: 'Logged out successfully' });
  } catch (error) {
    sendError(res, error, 'during logout');
  }
}
