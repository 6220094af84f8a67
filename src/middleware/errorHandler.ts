import { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { logger } from '../config/logger';
import { PipelineError } from '../services/pipeline/pipeline-error';

/**
 * Error with an HTTP status. Anything thrown from a route that is not an
 * AppError is reported as a 500.
 */
export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
  }
}

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Forward rejections from async controllers to the error middleware. */
export const asyncHandler = (fn: AsyncRoute): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export interface ErrorResponse {
  status: number;
  body: { success: false; message: string; failedStep?: string };
}

/** Map a thrown value to the status and JSON body sent to the client. */
export function toErrorResponse(err: Error): ErrorResponse {
  if (err instanceof AppError) {
    return { status: err.statusCode, body: { success: false, message: err.message } };
  }

  if (err instanceof multer.MulterError) {
    return { status: 400, body: { success: false, message: err.message } };
  }

  if (err instanceof PipelineError) {
    return { status: 500, body: { success: false, message: err.message, failedStep: err.failedStep } };
  }

  return {
    status: 500,
    body: {
      success: false,
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    },
  };
}

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const { status, body } = toErrorResponse(err);

  if (err instanceof PipelineError) {
    logger.error(`${req.method} ${req.path} failed at step ${err.failedStep}: ${err.message}`);
  } else if (status >= 500) {
    logger.error(`${req.method} ${req.path} failed: ${err.message}`, { stack: err.stack });
  }

  res.status(status).json(body);
};
