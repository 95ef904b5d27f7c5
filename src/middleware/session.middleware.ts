import { Request, Response, NextFunction } from 'express';
import { DataSource, EntityManager } from 'typeorm';
import '../types/express';
import { openSession } from '../config/database';

/**
 * One store session per request. It is released once the response has
 * finished or the client has gone away, whichever comes first.
 */
export const scopedSession = (dataSource: DataSource) =>
  (req: Request, res: Response, next: NextFunction) => {
    const session = openSession(dataSource);
    req.db = session.manager;

    const release = () => {
      session.release().catch((error: unknown) => {
        console.error('Failed to release database session:', error);
      });
    };
    res.once('finish', release);
    res.once('close', release);
    next();
  };

export const sessionManager = (req: Request): EntityManager => {
  if (!req.db) {
    throw new Error(`No database session for ${req.method} ${req.originalUrl}`);
  }
  return req.db;
};
