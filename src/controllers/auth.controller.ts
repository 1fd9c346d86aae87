import { Request, Response } from 'express';
import { AuthService } from '../services/auth.service';
import { UserService } from '../services/user.service';
import { authSchemas, validateInput } from '../utils/validation.utils';
import { UnauthorizedError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';

/**
 * Auth Controller
 * Exchanges credentials for a bearer token
 */
export class AuthController {
  private authService: AuthService;
  private userService: UserService;

  constructor(authService: AuthService, userService: UserService) {
    this.authService = authService;
    this.userService = userService;
  }

  /**
   * POST /login
   *
   * Request body:
   * { "username": "alice", "password": "..." }
   *
   * Response:
   * { "access_token": "<jwt>", "token_type": "bearer", "expires_in": 172800 }
   */
  async login(req: Request, res: Response): Promise<void> {
    const { username, password } = validateInput(authSchemas.login, req.body);

    const user = await this.userService.authenticate(username, password);
    if (!user) {
      logger.warn('Login failed', { username });
      throw new UnauthorizedError('Incorrect username or password');
    }

    res.status(200).json(this.authService.createToken(user));
    logger.info(`User authenticated: ${user.username}`);
  }
}
