import 'reflect-metadata';
import { config as loadDotenv } from 'dotenv';
import { loadConfig } from './config/env.validation';
import { createDataSource, initializeDatabase } from './config/database';
import { YahooQuoteProvider } from './services/quote.service';
import { createApp } from './app';

async function start() {
  loadDotenv();
  const config = loadConfig();
  const dataSource = createDataSource(config);

  try {
    await initializeDatabase(dataSource);
    console.log(`Database ready at ${config.databasePath}`);
  } catch (error) {
    console.error('Error connecting to database:', error);
    process.exit(1);
  }

  const app = createApp({
    config,
    dataSource,
    quoteProvider: YahooQuoteProvider.fromConfig(config),
  });

  const server = app.listen(config.port, () => {
    console.log(`Server running on port ${config.port} (${config.nodeEnv})`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}. Performing graceful shutdown...`);
    server.close(() => {
      dataSource.destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('Error closing database:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
