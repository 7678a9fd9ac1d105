import { Router } from 'express';
import {
  getMe,
  deleteMe,
  listMyDevices,
  addDevice,
  setDeviceKeys,
  removeDevice,
  getPreKeyStatus,
  uploadPreKeys,
  listMyChannels,
} from '../controllers/me';

// Mounted behind `authenticate`
const router = Router();

router.get('/', getMe);
router.delete('/', deleteMe);

router.get('/devices', listMyDevices);
router.post('/device', addDevice);
router.put('/device/:deviceId', setDeviceKeys);
router.delete('/device/:deviceId', removeDevice);

router.get('/device/:deviceId/otks', getPreKeyStatus);
router.post('/device/:deviceId/otks', uploadPreKeys);

router.get('/channels', listMyChannels);

export default router;
