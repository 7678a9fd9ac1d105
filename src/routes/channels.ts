import { Router } from 'express';
import { createChannel, getChannel, sendMessage, getHistory } from '../controllers/channels';

// Mounted behind `authenticate`
const router = Router();

router.post('/', createChannel);
router.get('/:channelId', getChannel);
router.post('/:channelId/msg', sendMessage);
router.get('/:channelId/history', getHistory);

export default router;
