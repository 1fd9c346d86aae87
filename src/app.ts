import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Pool } from 'pg';
import { AuthService } from './services/auth.service';
import { UserService } from './services/user.service';
import { AdvertisementService } from './services/advertisement.service';
import { AuthController } from './controllers/auth.controller';
import { UserController } from './controllers/user.controller';
import { AdvertisementController } from './controllers/advertisement.controller';
import { HealthController } from './controllers/health.controller';
import { createAuthRoutes } from './routes/auth.routes';
import { createUserRoutes } from './routes/user.routes';
import { createAdvertisementRoutes } from './routes/advertisement.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { globalRateLimiter, enforceBodySize } from './middleware/rate.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { config } from './config/config';
import { logger, logRequest } from './utils/logger';

/**
 * Create and configure Express application
 * Services are built on the given pool so tests can pass an in-memory one
 */
export function createApp(pool: Pool): Application {
  const app = express();

  const authService = new AuthService();
  const userService = new UserService(pool);
  const advertisementService = new AdvertisementService(pool);
  const auth = createAuthMiddleware(authService, userService);

  // ============================================
  // Security Middleware
  // ============================================

  // Helmet: Sets various HTTP headers for security
  app.use(
    helmet({
      contentSecurityPolicy: false, // Disable CSP for API
      crossOriginEmbedderPolicy: false,
    })
  );

  // ============================================
  // DoS Mitigations (Rate Limit & Size Guard)
  // ============================================

  // Global per-IP rate limiter
  app.use(globalRateLimiter);

  // Payload size guard (uses Content-Length)
  app.use(enforceBodySize);

  // CORS: Enable Cross-Origin Resource Sharing
  app.use(
    cors({
      origin: '*', // For development; restrict in production
      methods: ['GET', 'POST', 'PATCH', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      exposedHeaders: ['offset'], // Expose pagination header
    })
  );

  // ============================================
  // Body Parsing Middleware
  // ============================================

  app.use(express.json({ limit: config.http.maxBodyBytes }));

  // ============================================
  // Request Logging Middleware
  // ============================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    // Log when response finishes
    res.on('finish', () => {
      const duration = Date.now() - startTime;
      logRequest(req.method, req.url, res.statusCode, duration);
    });

    next();
  });

  // ============================================
  // Identity (anonymous unless a valid bearer token is sent)
  // ============================================

  app.use(auth.resolvePrincipal);

  // ============================================
  // API Routes
  // ============================================

  app.use('/', createHealthRoutes(new HealthController(pool)));
  app.use('/', createAuthRoutes(new AuthController(authService, userService)));
  app.use('/', createUserRoutes(new UserController(userService), auth));
  app.use(
    '/',
    createAdvertisementRoutes(new AdvertisementController(advertisementService), auth)
  );

  // ============================================
  // Error Handling
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  logger.info('Express application configured successfully');

  return app;
}
