import { Pool } from 'pg';
import { UserService } from '../../src/services/user.service';
import { AuthService } from '../../src/services/auth.service';
import { User, UserRole } from '../../src/types/user.types';

export const TEST_PASSWORD = 'password123';

/**
 * Create a user straight through the service
 */
export async function createTestUser(
  pool: Pool,
  username: string,
  role: UserRole = 'user'
): Promise<User> {
  return new UserService(pool).createUser({
    username,
    email: `${username}@example.com`,
    password: TEST_PASSWORD,
    role,
  });
}

/**
 * Authorization header value for a user
 */
export function bearer(user: User): string {
  return `Bearer ${new AuthService().createToken(user).access_token}`;
}
