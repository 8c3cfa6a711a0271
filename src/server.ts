// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { initDatabaseService, DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { createEmailService } from '@/application/email/EmailService.js';
import { createServices } from '@/services.js';
import { appLogger, errorMessage } from '@/utils/logger.js';

async function main(): Promise<void> {
  const config = buildAppConfig(process.env);

  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  let dbService: DatabaseService;
  try {
    dbService = await initDatabaseService(config.database.path);
    const stats = dbService.getStats();
    appLogger.info('Database ready', {
      path: config.database.path,
      users: stats.users.totalUsers,
      enabledUsers: stats.users.enabledUsers,
      pendingActivations: stats.activationTokens.pendingTokens,
    });
  } catch (error) {
    appLogger.error('Failed to initialize database', { error: errorMessage(error) });
    process.exit(1);
  }

  const services = createServices(
    {
      users: dbService.users,
      roles: dbService.roles,
      activationTokens: dbService.activationTokens,
      books: dbService.books,
      transactions: dbService.transactions,
    },
    createEmailService(config.mail),
    config
  );

  const app = createApp(services, {
    corsOrigins: config.server.corsOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    rateLimitEnabled: config.server.rateLimitEnabled,
  });

  const server = app.listen(config.server.port, config.server.host, () => {
    appLogger.info('Server started', {
      url: `http://${config.server.host}:${config.server.port}`,
      nodeEnv: config.server.nodeEnv,
      activationEmailPolicy: config.mail.activationEmailPolicy,
    });
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    appLogger.info('Shutting down', { signal });
    server.close(() => {
      DatabaseService.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          appLogger.error('Database close failed', { error: errorMessage(error) });
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      appLogger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    appLogger.error('Uncaught exception', { error: errorMessage(err), stack: err.stack });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    appLogger.error('Unhandled rejection', { error: errorMessage(reason) });
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
