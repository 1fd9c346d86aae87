import { Pool } from 'pg';
import bcrypt from 'bcryptjs';
import { config } from '../config/config';
import {
  CreateUserInput,
  UpdateUserInput,
  User,
  UserRole,
  UserRow,
  isUserRole,
} from '../types/user.types';
import { logger } from '../utils/logger';
import { handleDatabaseError } from '../middleware/error.middleware';

// bcrypt ignores everything past this many bytes
const BCRYPT_MAX_BYTES = 72;

const USER_COLUMNS = 'id, username, email, password_hash, role, created_at';

function rowToUser(row: UserRow): User {
  const role: UserRole = isUserRole(row.role) ? row.role : 'user';

  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role,
    createdAt: row.created_at,
  };
}

/**
 * Roll back the open transaction
 * A failing ROLLBACK is logged, not thrown
 */
export async function rollbackTransaction(
  client: { query(text: string): Promise<unknown> },
  context: Record<string, unknown> = {}
): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    logger.error('Rollback failed', { ...context, error: rollbackError });
  }
}

export class UserService {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Hash password securely using bcrypt
   */
  async hashPassword(password: string): Promise<string> {
    const length = Buffer.byteLength(password, 'utf8');
    if (length > BCRYPT_MAX_BYTES) {
      logger.warn(
        `Password is ${length} bytes; only the first ${BCRYPT_MAX_BYTES} are used for hashing`
      );
    }

    return bcrypt.hash(password, config.auth.bcryptRounds);
  }

  /**
   * Create a new user
   */
  async createUser(input: CreateUserInput): Promise<User> {
    const passwordHash = await this.hashPassword(input.password);

    const query = `
      INSERT INTO users (username, email, password_hash, role)
      VALUES ($1, $2, $3, $4)
      RETURNING ${USER_COLUMNS}
    `;

    try {
      const result = await this.pool.query<UserRow>(query, [
        input.username,
        input.email,
        passwordHash,
        input.role ?? 'user',
      ]);

      logger.info(`User created: ${input.username}`);
      return rowToUser(result.rows[0]);
    } catch (error) {
      handleDatabaseError(error);
    }
  }

  /**
   * Find user by id
   */
  async findById(id: number): Promise<User | null> {
    const query = `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`;

    const result = await this.pool.query<UserRow>(query, [id]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  /**
   * Find user by username
   */
  async findByUsername(username: string): Promise<User | null> {
    const query = `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`;

    const result = await this.pool.query<UserRow>(query, [username]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  /**
   * Find user by email
   */
  async findByEmail(email: string): Promise<User | null> {
    const query = `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`;

    const result = await this.pool.query<UserRow>(query, [email]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  /**
   * Apply a partial update
   * Returns the updated user, or null if no user has this id
   */
  async updateUser(id: number, changes: UpdateUserInput): Promise<User | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (changes.username !== undefined) {
      assignments.push(`username = $${paramIndex++}`);
      params.push(changes.username);
    }

    if (changes.email !== undefined) {
      assignments.push(`email = $${paramIndex++}`);
      params.push(changes.email);
    }

    if (changes.password !== undefined) {
      assignments.push(`password_hash = $${paramIndex++}`);
      params.push(await this.hashPassword(changes.password));
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    const query = `
      UPDATE users
      SET ${assignments.join(', ')}
      WHERE id = $${paramIndex}
      RETURNING ${USER_COLUMNS}
    `;
    params.push(id);

    try {
      const result = await this.pool.query<UserRow>(query, params);
      if (result.rows.length === 0) {
        return null;
      }

      logger.info(`User updated: ${id}`, { fields: Object.keys(changes) });
      return rowToUser(result.rows[0]);
    } catch (error) {
      handleDatabaseError(error);
    }
  }

  /**
   * Delete a user together with their advertisements
   */
  async deleteUser(id: number): Promise<boolean> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM advertisements WHERE owner_id = $1', [id]);
      const result = await client.query('DELETE FROM users WHERE id = $1', [id]);
      await client.query('COMMIT');

      if (result.rowCount && result.rowCount > 0) {
        logger.info(`User deleted: ${id}`);
        return true;
      }

      return false;
    } catch (error) {
      await rollbackTransaction(client, { id });
      handleDatabaseError(error);
    } finally {
      client.release();
    }
  }

  /**
   * Verify credentials
   * Returns the user on success, null on unknown user or wrong password
   */
  async authenticate(username: string, password: string): Promise<User | null> {
    const user = await this.findByUsername(username);
    if (!user) {
      return null;
    }

    const valid = await bcrypt.compare(password, user.passwordHash);
    return valid ? user : null;
  }

  /**
   * Initialize the bootstrap admin user if configured and missing
   */
  async ensureDefaultAdmin(): Promise<void> {
    const { username, email, password } = config.admin;

    if (!password) {
      logger.info('ADMIN_PASSWORD not set; skipping default admin creation');
      return;
    }

    const existing = await this.findByUsername(username);
    if (existing) {
      return;
    }

    await this.createUser({ username, email, password, role: 'admin' });
    logger.info('Default admin user created', { username });
  }
}
