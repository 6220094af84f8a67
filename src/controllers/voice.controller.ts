import { Request, Response } from 'express';
import { VOICE_ACTORS } from '../config/settings';
import elevenLabsService from '../services/tts/elevenlabs.service';

/**
 * Voice actors the pipelines accept, by friendly name
 */
export const getVoices = (req: Request, res: Response): void => {
  res.json({
    success: true,
    data: {
      configured: elevenLabsService.isConfigured(),
      voices: Object.entries(VOICE_ACTORS).map(([name, voiceId]) => ({ name, voiceId })),
    },
  });
};
