import jwt, { JwtPayload } from 'jsonwebtoken';
import { config } from '../config/config';
import { AuthConfig } from '../types/config.types';
import { TokenClaims, TokenResponse, User, isUserRole } from '../types/user.types';
import { logger } from '../utils/logger';

const ALGORITHM = 'HS256';

type TokenOptions = Pick<AuthConfig, 'jwtSecret' | 'tokenExpireHours'>;

/**
 * Issues and verifies stateless HS256 access tokens.
 * Tokens carry the username as `sub`, plus `user_id` and `role`.
 */
export class AuthService {
  private options: TokenOptions;

  constructor(options: TokenOptions = config.auth) {
    this.options = options;
  }

  /**
   * Token lifetime in seconds
   */
  get expiresIn(): number {
    return this.options.tokenExpireHours * 60 * 60;
  }

  /**
   * Create a signed access token for a user
   */
  createToken(user: Pick<User, 'id' | 'username' | 'role'>): TokenResponse {
    const token = jwt.sign(
      { sub: user.username, user_id: user.id, role: user.role },
      this.options.jwtSecret,
      { algorithm: ALGORITHM, expiresIn: this.expiresIn }
    );

    logger.info(`Token created for user: ${user.username}`);

    return {
      access_token: token,
      token_type: 'bearer',
      expires_in: this.expiresIn,
    };
  }

  /**
   * Validate a token
   * Returns the claims if valid, null otherwise
   */
  verifyToken(token: string): TokenClaims | null {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, this.options.jwtSecret, { algorithms: [ALGORITHM] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        logger.debug('Token expired', { expiredAt: error.expiredAt });
      } else {
        logger.warn('Token verification failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
      return null;
    }

    if (typeof payload === 'string') {
      logger.warn('Token payload is not an object');
      return null;
    }

    const { sub, user_id: userId, role, iat, exp } = payload;

    if (
      typeof sub !== 'string' ||
      typeof userId !== 'number' ||
      !isUserRole(role) ||
      typeof iat !== 'number' ||
      typeof exp !== 'number'
    ) {
      logger.warn('Token is missing required claims');
      return null;
    }

    return { sub, user_id: userId, role, iat, exp };
  }
}

/**
 * Extract token from an Authorization header
 * Accepts "Bearer <token>" with any casing of the scheme
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    logger.debug('Invalid authorization header format');
    return null;
  }

  return parts[1];
}
