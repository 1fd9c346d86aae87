import { Router } from 'express';
import { UserController } from '../controllers/user.controller';
import { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * User routes
 * Every route runs after `resolvePrincipal` has been mounted on the app
 */
export function createUserRoutes(controller: UserController, auth: AuthMiddleware): Router {
  const router = Router();

  /**
   * POST /user
   * Register a new user (no authentication required)
   *
   * Response:
   * - 201: Created user
   * - 400: Invalid body, username or email taken
   * - 403: Non-admin requested the admin role
   */
  router.post(
    '/user',
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.createUser(req, res);
    })
  );

  /**
   * GET /user/:id
   * Public profile lookup
   */
  router.get(
    '/user/:id',
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.getUser(req, res);
    })
  );

  /**
   * PATCH /user/:id
   *
   * Response:
   * - 200: Updated user
   * - 401: Authentication required
   * - 403: Not the account owner and not an admin
   * - 404: User not found
   */
  router.patch(
    '/user/:id',
    auth.requireAuth,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.updateUser(req, res);
    })
  );

  /**
   * DELETE /user/:id
   * Also removes the user's advertisements
   */
  router.delete(
    '/user/:id',
    auth.requireAuth,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.deleteUser(req, res);
    })
  );

  return router;
}
