import '../types/express';
import { Router, Request, Response, NextFunction } from 'express';
import { body, matchedData } from 'express-validator';
import { AuthService } from '../services/auth.service';
import { CredentialService, fitsBcrypt, MAX_PASSWORD_BYTES } from '../services/credential.service';
import { UserRepository } from '../repositories/UserRepository';
import { auth } from '../middleware/auth.middleware';
import { validate } from '../middleware/validate.middleware';
import { sessionManager } from '../middleware/session.middleware';
import { UnauthorizedError, ValidationError } from '../errors/http.errors';

const passwordLength = body('password')
  .custom((password: unknown) => typeof password !== 'string' || fitsBcrypt(password))
  .withMessage(`password must be at most ${MAX_PASSWORD_BYTES} bytes`);

const readCredentials = (data: Record<string, unknown>) => {
  const { email, password } = data;
  if (typeof email !== 'string' || typeof password !== 'string') {
    throw new ValidationError('email and password are required');
  }
  return { email, password };
};

export const createAuthRouter = (credentials: CredentialService): Router => {
  const router = Router();
  const authService = (req: Request) => new AuthService(new UserRepository(sessionManager(req)), credentials);

  router.post('/register',
    [
      body('email').isString().trim().isEmail(),
      body('password').isString().bail().isLength({ min: 6 }),
      passwordLength,
    ],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { email, password } = readCredentials(matchedData(req));
        const user = await authService(req).register(email, password);
        res.status(201).json(user);
      } catch (error) {
        next(error);
      }
    }
  );

  router.post('/login',
    [
      body('email').isString().trim().isEmail(),
      body('password').isString(),
      passwordLength,
    ],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { email, password } = readCredentials(matchedData(req));
        const token = await authService(req).login(email, password);
        res.json(token);
      } catch (error) {
        next(error);
      }
    }
  );

  // Protected route that requires a bearer token
  router.get('/me', auth(credentials), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.user) throw new UnauthorizedError();
      const user = await authService(req).me(req.user.sub);
      res.json(user);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
