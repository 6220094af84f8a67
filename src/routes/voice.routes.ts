import { Router } from 'express';
import * as voiceController from '../controllers/voice.controller';

const router = Router();

router.get('/', voiceController.getVoices);

export default router;
