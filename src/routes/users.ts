import { Router } from 'express';
import {
  registerUser,
  getUser,
  listUserDevices,
  getDeviceKeys,
  claimOneTimeKey,
} from '../controllers/users';
import { authenticate } from '../middleware/auth';
import { apiLimiter, createLimiter } from '../middleware/rateLimit';

const router = Router();

const registerLimiter = createLimiter(
  60 * 60 * 1000,
  20,
  'Too many registrations, please try again later.'
);

// Claims drain another device's pool, so they are capped separately
const claimLimiter = createLimiter(60 * 1000, 30, 'Too many key claims, please try again later.');

router.post('/register', registerLimiter, registerUser);

router.get('/:userId', apiLimiter, authenticate, getUser);
router.get('/:userId/devices', apiLimiter, authenticate, listUserDevices);
router.get('/:userId/devices/:deviceId', apiLimiter, authenticate, getDeviceKeys);
router.post('/:userId/devices/:deviceId/otk', claimLimiter, authenticate, claimOneTimeKey);

export default router;
