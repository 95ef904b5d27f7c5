import '../types/express';
import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { body, param, query, matchedData, ValidationChain } from 'express-validator';
import { TransactionService } from '../services/transaction.service';
import { TransactionRepository } from '../repositories/TransactionRepository';
import { validate } from '../middleware/validate.middleware';
import { sessionManager } from '../middleware/session.middleware';
import { ValidationError } from '../errors/http.errors';
import {
  CreateTransactionInput,
  TRANSACTION_TYPES,
  TransactionFilter,
  isTransactionType,
} from '../types';

const CALENDAR_DATE = /^\d{4}-\d{2}-\d{2}/;

// Datetimes are accepted and kept as the calendar date they were written with.
const toCalendarDate = (value: string): string => value.slice(0, 10);

const readCreateInput = (data: Record<string, unknown>): CreateTransactionInput => {
  const { type, category, amount, date } = data;
  if (
    !isTransactionType(type) ||
    typeof category !== 'string' ||
    typeof amount !== 'number' ||
    typeof date !== 'string'
  ) {
    throw new ValidationError('type, category, amount and date are required');
  }
  return { type, category, amount, date };
};

const readFilter = (data: Record<string, unknown>): TransactionFilter => {
  const filter: TransactionFilter = {};
  if (isTransactionType(data.type)) filter.type = data.type;
  if (typeof data.category === 'string') filter.category = data.category;
  if (typeof data.from === 'string') filter.from = data.from;
  if (typeof data.to === 'string') filter.to = data.to;
  return filter;
};

const isoDate = (field: ValidationChain) =>
  field.isISO8601({ strict: true }).matches(CALENDAR_DATE).customSanitizer(toCalendarDate);

const filterRules = [
  query('type').optional().isIn([...TRANSACTION_TYPES]),
  query('category').optional().isString(),
  isoDate(query('from').optional()),
  isoDate(query('to').optional()),
];

export interface TransactionRouterOptions {
  // Runs in front of every route when set.
  guard?: RequestHandler;
}

export const createTransactionRouter = ({ guard }: TransactionRouterOptions = {}): Router => {
  const router = Router();
  const transactionService = (req: Request) => new TransactionService(new TransactionRepository(sessionManager(req)));

  if (guard) router.use(guard);

  router.post('/',
    [
      body('type').isIn([...TRANSACTION_TYPES]).withMessage(`type must be one of: ${TRANSACTION_TYPES.join(', ')}`),
      body('category').isString(),
      body('amount').isFloat().toFloat(),
      isoDate(body('date')),
    ],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const transaction = await transactionService(req).create(readCreateInput(matchedData(req)));
        res.status(201).json(transaction);
      } catch (error) {
        next(error);
      }
    }
  );

  router.get('/', filterRules, validate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const transactions = await transactionService(req).list(readFilter(matchedData(req)));
      res.json(transactions);
    } catch (error) {
      next(error);
    }
  });

  router.get('/summary', filterRules, validate, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await transactionService(req).summary(readFilter(matchedData(req)));
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id',
    [param('id').isInt({ min: 1 }).toInt()],
    validate,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = matchedData(req);
        if (typeof id !== 'number') throw new ValidationError('id must be an integer');
        await transactionService(req).delete(id);
        res.status(204).send();
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
};
