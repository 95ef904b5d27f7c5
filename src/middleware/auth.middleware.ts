import { Request, Response, NextFunction } from 'express';
import '../types/express';
import { CredentialService } from '../services/credential.service';
import { UnauthorizedError } from '../errors/http.errors';

export const auth = (credentials: CredentialService) =>
  (req: Request, _res: Response, next: NextFunction) => {
    try {
      const token = req.header('Authorization')?.replace(/^Bearer\s+/i, '');
      if (!token) throw new UnauthorizedError();

      req.user = credentials.verifyToken(token);
      next();
    } catch (error) {
      next(error);
    }
  };
