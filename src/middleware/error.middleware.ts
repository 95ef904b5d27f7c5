import { Request, Response, NextFunction } from 'express';
import { HttpError } from '../errors/http.errors';

export const notFoundHandler = (_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
};

export const errorHandler = (err: unknown, _req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(err);
  }
  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }
  // Malformed JSON bodies come through body-parser as 400s.
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ error: 'Request body must be valid JSON' });
  }
  console.error(err instanceof Error ? err.stack : err);
  res.status(500).json({ error: 'An unexpected error occurred' });
};
