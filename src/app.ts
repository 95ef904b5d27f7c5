import express, { Express } from 'express';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import { DataSource } from 'typeorm';
import { AppConfig } from './config/env.validation';
import { CredentialService } from './services/credential.service';
import { QuoteProvider, QuoteService } from './services/quote.service';
import { createAuthRouter } from './routes/auth.routes';
import { createTransactionRouter } from './routes/transaction.routes';
import { createStockRouter } from './routes/stock.routes';
import { createHealthRouter } from './routes/health.routes';
import { auth } from './middleware/auth.middleware';
import { scopedSession } from './middleware/session.middleware';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export interface AppDependencies {
  config: AppConfig;
  dataSource: DataSource;
  quoteProvider: QuoteProvider;
}

export function createApp({ config, dataSource, quoteProvider }: AppDependencies): Express {
  const app = express();
  const credentials = new CredentialService(config);

  // Security middleware
  app.use(helmet());

  // Rate limiting middleware
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: config.rateLimitMax,
    message: { error: 'Too many requests from this IP, please try again later.' },
  }));

  app.use(express.json());
  if (config.nodeEnv !== 'test') {
    app.use(requestLogger);
  }

  // Routes
  app.use(createHealthRouter(dataSource));
  app.use('/auth', scopedSession(dataSource), createAuthRouter(credentials));
  app.use('/transactions', scopedSession(dataSource), createTransactionRouter({
    guard: config.authRequired ? auth(credentials) : undefined,
  }));
  app.use('/stock-price', createStockRouter(new QuoteService(quoteProvider)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
