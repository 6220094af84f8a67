import { Router } from 'express';
import generationRoutes from './generation.routes';
import historyRoutes from './history.routes';
import profileRoutes from './profile.routes';
import voiceRoutes from './voice.routes';

const router = Router();

// Mount routes
router.use('/generations', generationRoutes);
router.use('/history', historyRoutes);
router.use('/profiles', profileRoutes);
router.use('/voices', voiceRoutes);

// Health check for API
router.get('/health', (req, res) => {
  res.json({
    success: true,
    message: 'API is running',
    timestamp: new Date().toISOString(),
  });
});

export default router;
