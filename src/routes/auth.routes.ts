import { Router } from 'express';
import { AuthController } from '../controllers/auth.controller';
import { loginRateLimiter } from '../middleware/rate.middleware';
import { asyncHandler } from '../middleware/error.middleware';

export function createAuthRoutes(controller: AuthController): Router {
  const router = Router();

  /**
   * POST /login
   * Login endpoint - returns a bearer token valid for 48 hours
   *
   * Response:
   * - 200: { access_token, token_type, expires_in }
   * - 400: Missing username or password
   * - 401: Incorrect username or password
   */
  router.post(
    '/login',
    loginRateLimiter,
    asyncHandler(async (req, res) => {
      await controller.login(req, res);
    })
  );

  return router;
}
