import type { Response } from 'express';
import { z } from 'zod';
import { getErrorStatus } from '../errors/http-error';
import { logger } from '../utils/logger';

export function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({
      success: false,
      error: 'Invalid request payload',
      details: error.flatten(),
    });
  }

  const status = getErrorStatus(error);
  if (status && status < 500) {
    return res.status(status).json({
      success: false,
      error: error instanceof Error ? error.message : fallback,
    });
  }

  logger.error(fallback, error);
  return res.status(500).json({ success: false, error: fallback });
}
