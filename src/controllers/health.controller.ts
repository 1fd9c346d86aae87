import { Request, Response } from 'express';
import { Pool } from 'pg';
import { logger } from '../utils/logger';

/**
 * Health Controller
 * Liveness plus a database round trip
 */
export class HealthController {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * GET /
   */
  root(req: Request, res: Response): void {
    res.status(200).json({
      service: 'Advertisement Service',
      version: '2.0.0',
      status: 'running',
      endpoints: {
        health: 'GET /health',
        login: 'POST /login',
        users: 'POST /user, GET|PATCH|DELETE /user/:id',
        advertisements: 'POST|GET /advertisement, GET|PATCH|DELETE /advertisement/:id',
      },
    });
  }

  /**
   * GET /health
   *
   * Response:
   * - 200: System healthy
   * - 503: Database unreachable
   */
  async healthCheck(req: Request, res: Response): Promise<void> {
    const timestamp = new Date().toISOString();

    try {
      await this.pool.query('SELECT 1');
      res.status(200).json({ status: 'healthy', timestamp, database: 'connected' });
    } catch (error) {
      logger.error('Health check failed:', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      res.status(503).json({ status: 'unhealthy', timestamp, database: 'disconnected' });
    }
  }
}
