import { Response } from 'express';
import { AdvertisementService } from '../services/advertisement.service';
import { Advertisement } from '../types/advertisement.types';
import { AuthenticatedRequest, getPrincipal } from '../middleware/auth.middleware';
import { Principal, assertAllowed } from '../policies/authorization.policy';
import { NotFoundError, UnauthorizedError } from '../middleware/error.middleware';
import { advertisementSchemas, parseIdParam, validateInput } from '../utils/validation.utils';
import {
  getPaginationParams,
  getSqlLimit,
  processPaginatedResults,
} from '../utils/pagination.utils';
import { toAdvertisementResponse } from '../utils/response.utils';
import { logger } from '../utils/logger';

/**
 * Advertisement Controller
 * Handles HTTP requests for advertisement CRUD and search
 */
export class AdvertisementController {
  private advertisementService: AdvertisementService;

  constructor(advertisementService: AdvertisementService) {
    this.advertisementService = advertisementService;
  }

  private async loadAdvertisement(id: number): Promise<Advertisement> {
    const advertisement = await this.advertisementService.findById(id);
    if (!advertisement) {
      throw new NotFoundError('Advertisement not found');
    }
    return advertisement;
  }

  /**
   * POST /advertisement
   * Authenticated users only; the caller becomes the owner
   */
  async createAdvertisement(req: AuthenticatedRequest, res: Response): Promise<void> {
    const principal: Principal = getPrincipal(req);

    assertAllowed(principal, 'create', { kind: 'advertisement', ownerId: null });

    // Narrows the principal; the policy already denies anonymous creates
    if (principal.kind === 'anonymous') {
      throw new UnauthorizedError('Authentication required');
    }

    const input = validateInput(advertisementSchemas.create, req.body);
    const advertisement = await this.advertisementService.create(input, principal.id);

    res.status(201).json(toAdvertisementResponse(advertisement));
  }

  /**
   * GET /advertisement/:id
   */
  async getAdvertisement(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);
    const advertisement = await this.loadAdvertisement(id);

    assertAllowed(getPrincipal(req), 'read', {
      kind: 'advertisement',
      ownerId: advertisement.ownerId,
    });

    res.status(200).json(toAdvertisementResponse(advertisement));
  }

  /**
   * GET /advertisement?title=&description=&min_price=&max_price=&offset=&limit=
   * Public search; the `offset` response header points at the next page
   */
  async searchAdvertisements(req: AuthenticatedRequest, res: Response): Promise<void> {
    const startTime = Date.now();

    assertAllowed(getPrincipal(req), 'search', { kind: 'advertisement', ownerId: null });

    const query = validateInput(advertisementSchemas.search, req.query);
    const pagination = getPaginationParams(query.offset, query.limit);

    const results = await this.advertisementService.search(
      {
        title: query.title,
        description: query.description,
        minPrice: query.min_price,
        maxPrice: query.max_price,
      },
      { offset: pagination.offset, limit: getSqlLimit(pagination.limit) }
    );

    const page = processPaginatedResults(results, pagination.offset, pagination.limit);

    // Set pagination header (must be string)
    if (page.nextOffset !== null) {
      res.set('offset', page.nextOffset);
    }

    logger.info('Search advertisements completed', {
      offset: pagination.offset,
      returned: page.items.length,
      hasMore: page.hasMore,
      duration: `${Date.now() - startTime}ms`,
    });

    res.status(200).json(page.items.map(toAdvertisementResponse));
  }

  /**
   * PATCH /advertisement/:id
   * Owners can update their ads, admins can update any
   */
  async updateAdvertisement(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);
    const existing = await this.loadAdvertisement(id);

    assertAllowed(
      getPrincipal(req),
      'update',
      { kind: 'advertisement', ownerId: existing.ownerId },
      'Not enough permissions to update this advertisement'
    );

    const changes = validateInput(advertisementSchemas.update, req.body);
    const advertisement = await this.advertisementService.update(id, changes);
    if (!advertisement) {
      throw new NotFoundError('Advertisement not found');
    }

    res.status(200).json(toAdvertisementResponse(advertisement));
  }

  /**
   * DELETE /advertisement/:id
   * Owners can delete their ads, admins can delete any
   */
  async deleteAdvertisement(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);
    const existing = await this.loadAdvertisement(id);

    assertAllowed(
      getPrincipal(req),
      'delete',
      { kind: 'advertisement', ownerId: existing.ownerId },
      'Not enough permissions to delete this advertisement'
    );

    const deleted = await this.advertisementService.delete(id);
    if (!deleted) {
      throw new NotFoundError('Advertisement not found');
    }

    res.status(200).json({ message: 'Advertisement deleted successfully' });
  }
}
