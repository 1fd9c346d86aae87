import { Router } from 'express';
import { HealthController } from '../controllers/health.controller';
import { asyncHandler } from '../middleware/error.middleware';

export function createHealthRoutes(controller: HealthController): Router {
  const router = Router();

  router.get('/', (req, res) => controller.root(req, res));

  /**
   * GET /health
   * Health check endpoint (no authentication required)
   */
  router.get(
    '/health',
    asyncHandler(async (req, res) => {
      await controller.healthCheck(req, res);
    })
  );

  return router;
}
