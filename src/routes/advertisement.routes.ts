import { Router } from 'express';
import { AdvertisementController } from '../controllers/advertisement.controller';
import { AuthMiddleware, AuthenticatedRequest } from '../middleware/auth.middleware';
import { asyncHandler } from '../middleware/error.middleware';

/**
 * Advertisement routes
 * Reads and search are public, mutations require a bearer token
 */
export function createAdvertisementRoutes(
  controller: AdvertisementController,
  auth: AuthMiddleware
): Router {
  const router = Router();

  /**
   * POST /advertisement
   *
   * Request:
   * - Header: Authorization: Bearer <token> (required)
   * - Body: { title, description, price }
   *
   * Response:
   * - 201: Advertisement created
   * - 400: Invalid body
   * - 401: Authentication required
   */
  router.post(
    '/advertisement',
    auth.requireAuth,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.createAdvertisement(req, res);
    })
  );

  /**
   * GET /advertisement
   * Search by title/description substring and price range
   *
   * Request:
   * - Query: title, description, min_price, max_price, offset, limit (all optional)
   *
   * Response:
   * - 200: AdvertisementResponse[] + offset header when more pages exist
   * - 400: Invalid query
   */
  router.get(
    '/advertisement',
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.searchAdvertisements(req, res);
    })
  );

  /**
   * GET /advertisement/:id
   */
  router.get(
    '/advertisement/:id',
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.getAdvertisement(req, res);
    })
  );

  /**
   * PATCH /advertisement/:id
   *
   * Response:
   * - 200: Updated advertisement
   * - 401: Authentication required
   * - 403: Not the owner and not an admin
   * - 404: Advertisement not found
   */
  router.patch(
    '/advertisement/:id',
    auth.requireAuth,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.updateAdvertisement(req, res);
    })
  );

  /**
   * DELETE /advertisement/:id
   */
  router.delete(
    '/advertisement/:id',
    auth.requireAuth,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await controller.deleteAdvertisement(req, res);
    })
  );

  return router;
}
