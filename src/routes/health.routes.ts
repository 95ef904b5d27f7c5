import '../types/express';
import { Router, Request, Response, NextFunction } from 'express';
import { DataSource } from 'typeorm';
import { scopedSession, sessionManager } from '../middleware/session.middleware';
import { TransactionRepository } from '../repositories/TransactionRepository';

export const createHealthRouter = (dataSource: DataSource): Router => {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' });
  });

  // Debug endpoints
  router.get('/db-test', scopedSession(dataSource), (_req: Request, res: Response) => {
    res.json({ message: 'DB session created successfully' });
  });

  router.get('/transactions-debug', scopedSession(dataSource), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const count = await new TransactionRepository(sessionManager(req)).count();
      res.json({ count });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
