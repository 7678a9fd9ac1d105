import { Router } from 'express';
import { startChallenge, completeChallenge, logout } from '../controllers/auth';
import { authenticate } from '../middleware/auth';
import { createLimiter } from '../middleware/rateLimit';

const router = Router();

// 10 challenge requests per minute per IP
const challengeLimiter = createLimiter(
  60 * 1000,
  10,
  'Too many challenge requests, please try again later.'
);

// Stricter for verify: 5 per minute per IP
const verifyLimiter = createLimiter(
  60 * 1000,
  5,
  'Too many verification attempts, please try again later.'
);

const logoutLimiter = createLimiter(60 * 1000, 10, 'Too many logout requests, please try again later.');

// POST /api/auth/challenge - Request a login challenge (nonce)
router.post('/challenge', challengeLimiter, startChallenge);

// POST /api/auth/verify - Verify signed challenge and open a session
router.post('/verify', verifyLimiter, completeChallenge);

// POST /api/auth/logout - Invalidate current session
router.post('/logout', logoutLimiter, authenticate, logout);

export default router;
