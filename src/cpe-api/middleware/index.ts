import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { ZodError } from 'zod';
import { CpeError } from '@core/errors';

export const requestLogger = morgan('dev');

/** Bad input and bad configuration are the caller's fault; anything else is ours. */
export function statusForError(err: Error): number {
  if (err instanceof CpeError || err instanceof ZodError) return 400;
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusForError(err);
  console.error('[ERROR]', err.message);
  res.status(status).json({ success: false, error: err.message });
}
