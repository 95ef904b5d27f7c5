import { EntityManager } from 'typeorm';
import { TokenClaims } from '../index';

declare global {
  namespace Express {
    interface Request {
      // Scoped unit of work; only set on routers mounted behind scopedSession.
      db?: EntityManager;
      user?: TokenClaims;
    }
  }
}

export {};
