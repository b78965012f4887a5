import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

/** Shape of errors raised by express' body parsers. */
interface HttpError extends Error {
  status?: number;
  type?: string;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof Error) {
    const { status, type } = err as HttpError;
    if (type === 'entity.parse.failed') {
      res.status(400).json({ error: 'invalid_json' });
      return;
    }
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ error: err.message });
      return;
    }
    console.error('[api] unhandled error', err);
  }
  res.status(500).json({ error: 'Internal server error' });
}
