import { Router } from 'express';
import * as historyController from '../controllers/history.controller';

const router = Router();

router.get('/', historyController.getHistory);
router.get('/:id', historyController.getHistoryEntry);
router.delete('/:id', historyController.deleteHistoryEntry);

export default router;
