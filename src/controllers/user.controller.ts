import { Response } from 'express';
import { UserService } from '../services/user.service';
import { AuthenticatedRequest, getPrincipal } from '../middleware/auth.middleware';
import { assertAllowed, isAdmin } from '../policies/authorization.policy';
import { BadRequestError, ForbiddenError, NotFoundError } from '../middleware/error.middleware';
import { parseIdParam, userSchemas, validateInput } from '../utils/validation.utils';
import { toUserResponse } from '../utils/response.utils';
import { logger } from '../utils/logger';

/**
 * User Controller
 * Registration and account management
 */
export class UserController {
  private userService: UserService;

  constructor(userService: UserService) {
    this.userService = userService;
  }

  /**
   * Reject a username or email already held by another account
   */
  private async assertUnique(
    fields: { username?: string; email?: string },
    exceptId?: number
  ): Promise<void> {
    if (fields.username !== undefined) {
      const existing = await this.userService.findByUsername(fields.username);
      if (existing && existing.id !== exceptId) {
        throw new BadRequestError('Username already registered');
      }
    }

    if (fields.email !== undefined) {
      const existing = await this.userService.findByEmail(fields.email);
      if (existing && existing.id !== exceptId) {
        throw new BadRequestError('Email already registered');
      }
    }
  }

  /**
   * POST /user
   * Public registration; only administrators may create other administrators
   */
  async createUser(req: AuthenticatedRequest, res: Response): Promise<void> {
    const principal = getPrincipal(req);
    const input = validateInput(userSchemas.create, req.body);

    assertAllowed(principal, 'create', { kind: 'user', ownerId: null });

    if (input.role === 'admin' && !isAdmin(principal)) {
      throw new ForbiddenError('Only administrators can assign the admin role');
    }

    await this.assertUnique(input);

    const user = await this.userService.createUser(input);
    res.status(201).json(toUserResponse(user));
  }

  /**
   * GET /user/:id
   */
  async getUser(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);

    assertAllowed(getPrincipal(req), 'read', { kind: 'user', ownerId: id });

    const user = await this.userService.findById(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    res.status(200).json(toUserResponse(user));
  }

  /**
   * PATCH /user/:id
   * Users can update themselves, admins can update anyone
   */
  async updateUser(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);

    assertAllowed(
      getPrincipal(req),
      'update',
      { kind: 'user', ownerId: id },
      'Not enough permissions to update this user'
    );

    const changes = validateInput(userSchemas.update, req.body);
    await this.assertUnique(changes, id);

    const user = await this.userService.updateUser(id, changes);
    if (!user) {
      throw new NotFoundError('User not found');
    }

    res.status(200).json(toUserResponse(user));
  }

  /**
   * DELETE /user/:id
   * Users can delete themselves, admins can delete anyone
   */
  async deleteUser(req: AuthenticatedRequest, res: Response): Promise<void> {
    const id = parseIdParam(req.params.id);

    assertAllowed(
      getPrincipal(req),
      'delete',
      { kind: 'user', ownerId: id },
      'Not enough permissions to delete this user'
    );

    const deleted = await this.userService.deleteUser(id);
    if (!deleted) {
      throw new NotFoundError('User not found');
    }

    res.status(200).json({ message: 'User deleted successfully' });
    logger.info(`User deleted by ${req.user?.username ?? 'unknown'}`, { id });
  }
}
