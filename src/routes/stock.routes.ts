import { Router, Request, Response, NextFunction } from 'express';
import { query, matchedData } from 'express-validator';
import { QuoteService } from '../services/quote.service';
import { validate } from '../middleware/validate.middleware';
import { ValidationError } from '../errors/http.errors';

export const createStockRouter = (quoteService: QuoteService): Router => {
  const router = Router();

  router.get('/',
    [
      query('symbol')
        .isString().withMessage('symbol is required').bail()
        .trim()
        .notEmpty().withMessage('symbol is required'),
    ],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { symbol } = matchedData(req);
        if (typeof symbol !== 'string') throw new ValidationError('symbol is required');
        res.json(await quoteService.getPrice(symbol));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
};
