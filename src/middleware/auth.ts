import { Request, Response, NextFunction } from 'express';
import { AuthError } from '../errors';
import { AuthService, SessionClaims } from '../services/AuthService';
import { ApiResponse } from '../types';

export interface AuthenticatedRequest extends Request {
  user?: SessionClaims;
}

function bearerToken(header: unknown): string | null {
  if (typeof header !== 'string' || !header.startsWith('Bearer ')) {
    return null;
  }
  const token = header.substring(7).trim();
  return token.length > 0 ? token : null;
}

/**
 * Authentication middleware.
 *
 * 1. Extracts the JWT from the Authorization header (Bearer token).
 * 2. Verifies the token signature and expiry.
 * 3. Checks that the session row behind the token still exists, so a
 *    logged-out token stops working immediately.
 */
export async function authenticate(
  req: AuthenticatedRequest,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const token = bearerToken(req.headers.authorization);
    const claims = token === null ? null : await AuthService.authenticateToken(token);

    if (claims === null) {
      const response: ApiResponse = {
        success: false,
        error: 'Authentication failed',
        kind: 'authentication_failed',
      };
      res.status(401).json(response);
      return;
    }

    req.user = claims;
    next();
  } catch (error) {
    console.error('Auth middleware error:', error);
    const response: ApiResponse = {
      success: false,
      error: 'Authentication failed',
      kind: 'internal_error',
    };
    res.status(500).json(response);
  }
}

/** Claims set by `authenticate`; throws if the route was mounted without it. */
export function currentUser(req: AuthenticatedRequest): SessionClaims {
  if (!req.user) {
    throw new AuthError('Not authenticated');
  }
  return req.user;
}
