import { createApp } from './app';
import { db } from './config/database';
import { config, validateConfig } from './config/config';
import { logger } from './utils/logger';
import { UserService } from './services/user.service';

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    for (const warning of validateConfig()) {
      logger.warn(warning);
    }

    // Test database connection
    logger.info('Testing database connection...');
    const dbConnected = await db.testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database');
      process.exit(1);
    }

    logger.info('Database connection successful');

    const pool = db.getPool();

    // Ensure bootstrap admin user exists
    const userService = new UserService(pool);
    await userService.ensureDefaultAdmin();

    // Create Express app
    const app = createApp(pool);

    // Start listening
    const server = app.listen(config.port, () => {
      logger.info(`Server started successfully`, {
        port: config.port,
        environment: config.nodeEnv,
        endpoints: {
          health: `http://localhost:${config.port}/health`,
          login: `http://localhost:${config.port}/login`,
          advertisements: `http://localhost:${config.port}/advertisement`,
        },
      });
    });

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received, starting graceful shutdown`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');

        // Close database connections
        db.close()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error during graceful shutdown:', error);
            process.exit(1);
          });
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    // Handle shutdown signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught errors
    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception:', error);
      gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled rejection:', { reason });
      gracefulShutdown('unhandledRejection');
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server
void startServer();
