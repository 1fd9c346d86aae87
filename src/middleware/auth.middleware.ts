import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { AuthService, extractBearerToken } from '../services/auth.service';
import { UserService } from '../services/user.service';
import { User } from '../types/user.types';
import { ANONYMOUS, Principal, authenticatedPrincipal } from '../policies/authorization.policy';
import { UnauthorizedError, asyncHandler } from './error.middleware';

/**
 * Extended Request interface with caller identity
 */
export interface AuthenticatedRequest extends Request {
  principal?: Principal;
  user?: User;
}

/**
 * Identity of the caller, anonymous unless `resolvePrincipal` found a valid token
 */
export function getPrincipal(req: AuthenticatedRequest): Principal {
  return req.principal ?? ANONYMOUS;
}

export interface AuthMiddleware {
  resolvePrincipal: RequestHandler;
  requireAuth: RequestHandler;
}

/**
 * Build the authentication middleware pair
 *
 * `resolvePrincipal` never rejects: a missing, malformed or invalid bearer
 * token, or one whose user no longer exists, leaves the caller anonymous.
 * `requireAuth` rejects anonymous callers with 401.
 */
export function createAuthMiddleware(
  authService: AuthService,
  userService: UserService
): AuthMiddleware {
  async function resolve(req: AuthenticatedRequest): Promise<void> {
    req.principal = ANONYMOUS;

    const token = extractBearerToken(req.get('Authorization'));
    if (!token) {
      return;
    }

    const claims = authService.verifyToken(token);
    if (!claims) {
      return;
    }

    // Keyed on user_id, never the username; role comes from the store
    const user = await userService.findById(claims.user_id);
    if (!user) {
      logger.warn('Token refers to unknown user', { userId: claims.user_id });
      return;
    }

    req.user = user;
    req.principal = authenticatedPrincipal(user.id, user.role);
    logger.debug('Authentication successful', { username: user.username });
  }

  const resolvePrincipal = asyncHandler(
    async (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      await resolve(req);
      next();
    }
  );

  const requireAuth = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    if (getPrincipal(req).kind === 'anonymous') {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    next();
  };

  return { resolvePrincipal, requireAuth };
}
