import { afterEach, describe, expect, it, vi } from 'vitest';
import multer from 'multer';
import { PipelineError } from '../services/pipeline/pipeline-error';
import { AppError, toErrorResponse } from './errorHandler';

describe('toErrorResponse', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses the status an AppError carries', () => {
    expect(toErrorResponse(new AppError('Profile not found', 404))).toEqual({
      status: 404,
      body: { success: false, message: 'Profile not found' },
    });
  });

  it('defaults AppError to 500', () => {
    expect(toErrorResponse(new AppError('boom')).status).toBe(500);
  });

  it('reports upload limits as bad requests', () => {
    expect(toErrorResponse(new multer.MulterError('LIMIT_FILE_SIZE', 'referenceVideos'))).toEqual({
      status: 400,
      body: { success: false, message: 'File too large' },
    });
  });

  it('includes the failed step of a pipeline error', () => {
    const error = new PipelineError('generate_audio', {}, new Error('quota exceeded'));

    expect(toErrorResponse(error)).toEqual({
      status: 500,
      body: {
        success: false,
        message: "Pipeline failed at step 'generate_audio': quota exceeded",
        failedStep: 'generate_audio',
      },
    });
  });

  it('passes unexpected messages through outside production', () => {
    expect(toErrorResponse(new Error('socket hang up')).body.message).toBe('socket hang up');
  });

  it('hides unexpected messages in production', () => {
    vi.stubEnv('NODE_ENV', 'production');

    expect(toErrorResponse(new Error('socket hang up'))).toEqual({
      status: 500,
      body: { success: false, message: 'Internal server error' },
    });
  });
});
